import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import type {ServiceDefinition} from '../types.js'

export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  const content = await readFile(filePath, 'utf8')
  return parse(content)
}

/**
 * Reads a dotenv file, returning an empty mapping when it does not exist.
 */
export async function loadOptionalEnvFile(filePath: string): Promise<Record<string, string>> {
  try {
    return await loadEnvFile(filePath)
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }
}

/**
 * Build the process environment of a service: env files in declaration
 * order, then inline `environment`. Later sources win.
 */
export async function resolveServiceEnvironment(service: ServiceDefinition): Promise<Record<string, string>> {
  let env: Record<string, string> = {}
  for (const envFile of service.envFiles) {
    const values = envFile.required
      ? await loadEnvFile(envFile.path)
      : await loadOptionalEnvFile(envFile.path)
    env = {...env, ...values}
  }

  return {...env, ...service.environment}
}
