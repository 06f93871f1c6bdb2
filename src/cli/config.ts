import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {parseDuration} from '../core/short-syntax.js'
import type {BerthConfig, RestartBackoff} from '../types.js'

export const configFilename = '.berth.yml'

const DurationSchema = z.union([z.string(), z.number().nonnegative()])

const ConfigSchema = z.object({
  workdir: z.string().optional(),
  stopGracePeriod: DurationSchema.optional(),
  restart: z.object({
    initialDelay: DurationSchema.optional(),
    maxDelay: DurationSchema.optional(),
    resetAfter: DurationSchema.optional()
  }).strict().optional()
}).strict()

/**
 * Loads the project-level `.berth.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<BerthConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  const result = ConfigSchema.safeParse(parsed)
  if (!result.success) {
    const [issue] = result.error.issues
    const path = issue.path.join('.')
    throw new Error(`${configFilename}: ${path ? `${path}: ` : ''}${issue.message}`)
  }

  const {workdir, stopGracePeriod, restart} = result.data
  const config: BerthConfig = {}
  if (workdir !== undefined) {
    config.workdir = workdir
  }

  if (stopGracePeriod !== undefined) {
    config.stopGracePeriodMs = parseDuration(stopGracePeriod, `${configFilename}: stopGracePeriod`)
  }

  if (restart) {
    const backoff: Partial<RestartBackoff> = {}
    if (restart.initialDelay !== undefined) {
      backoff.initialDelayMs = parseDuration(restart.initialDelay, `${configFilename}: restart.initialDelay`)
    }

    if (restart.maxDelay !== undefined) {
      backoff.maxDelayMs = parseDuration(restart.maxDelay, `${configFilename}: restart.maxDelay`)
    }

    if (restart.resetAfter !== undefined) {
      backoff.resetAfterMs = parseDuration(restart.resetAfter, `${configFilename}: restart.resetAfter`)
    }

    config.restart = backoff
  }

  return config
}
