import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {DescriptorLoader} from '../core/descriptor-loader.js'
import {Orchestrator} from '../core/orchestrator.js'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {DockerCliRuntime} from '../engine/docker-runtime.js'
import type {BerthConfig, Stack} from '../types.js'
import {loadConfig} from './config.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  file?: string;
  projectName?: string;
  workdir?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export const descriptorFilenames = [
  'berth.yml',
  'berth.yaml',
  'compose.yaml',
  'compose.yml',
  'docker-compose.yaml',
  'docker-compose.yml'
]

export async function resolveDescriptorFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch {
    throw new Error(`Path does not exist: ${target}`)
  }

  for (const filename of descriptorFilenames) {
    const candidate = join(target, filename)
    try {
      await access(candidate)
      return candidate
    } catch {
      // Try the next candidate
    }
  }

  throw new Error(
    `No descriptor file found in ${target}. Expected one of: ${descriptorFilenames.join(', ')}`
  )
}

/**
 * Workdir precedence: `--workdir`, then `$BERTH_WORKDIR`, then `.berth.yml`, then `.berth`.
 */
export function resolveWorkdir(option: string | undefined, config: BerthConfig, env: NodeJS.ProcessEnv = process.env): string {
  return resolve(option ?? env.BERTH_WORKDIR ?? config.workdir ?? '.berth')
}

export type CommandContext = {
  stack: Stack;
  config: BerthConfig;
  workdir: string;
  json: boolean;
}

/** Load configuration and the stack selected by the global options. */
export async function loadContext(cmd: Command): Promise<CommandContext> {
  const {file, projectName, workdir, json} = getGlobalOptions(cmd)
  const config = await loadConfig(process.cwd())
  const descriptor = await resolveDescriptorFile(file)
  const stack = await new DescriptorLoader({projectName}).load(descriptor)
  return {stack, config, workdir: resolveWorkdir(workdir, config), json: json ?? false}
}

export function createReporter(context: CommandContext, options?: {logs?: boolean}): Reporter {
  return context.json ? new ConsoleReporter() : new InteractiveReporter({logs: options?.logs})
}

export function createOrchestrator(context: CommandContext, reporter: Reporter): Orchestrator {
  return new Orchestrator(context.stack, {
    runtime: new DockerCliRuntime(),
    reporter,
    workdir: context.workdir,
    backoff: context.config.restart,
    stopGracePeriodMs: context.config.stopGracePeriodMs
  })
}
