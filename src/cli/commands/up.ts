import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {exitCodeFor, formatFailure} from '../exit-codes.js'
import {createOrchestrator, createReporter, loadContext} from '../utils.js'

type UpCommandOptions = {
  detach?: boolean;
  build?: boolean;
  timeout?: number;
}

/** Resolves on the first SIGINT or SIGTERM, aborting `controller`. */
function waitForShutdownSignal(controller: AbortController): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      controller.abort()
      resolve(signal)
    }

    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}

export function registerUpCommand(program: Command): void {
  program
    .command('up')
    .description('Create and start the stack')
    .argument('[services...]', 'Services to start, with their dependencies (default: all)')
    .option('-d, --detach', 'Start in the background and exit')
    .option('--build', 'Build images before starting containers')
    .option('-t, --timeout <seconds>', 'Shutdown grace period when interrupted (attached mode)', Number)
    .action(async (services: string[], options: UpCommandOptions, cmd: Command) => {
      const context = await loadContext(cmd)
      const reporter = createReporter(context, {logs: !options.detach})
      const orchestrator = createOrchestrator(context, reporter)

      // Listen before starting so that Ctrl-C during startup cancels it
      const interrupt = new AbortController()
      const shutdown = options.detach ? undefined : waitForShutdownSignal(interrupt)

      try {
        const result = await orchestrator.up({
          services,
          attach: !options.detach,
          build: options.build,
          signal: interrupt.signal
        })

        for (const error of result.errors) {
          console.error(chalk.red(formatFailure(error)))
        }

        if (context.json) {
          console.log(JSON.stringify(result.services))
        }

        const [firstError] = result.errors
        const exitCode = result.ok ? 0 : (firstError ? exitCodeFor(firstError) : 1)

        if (shutdown && (interrupt.signal.aborted || result.services.some(service => service.state === 'running'))) {
          await shutdown
          await orchestrator.down({timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000})
        }

        process.exitCode = exitCode
      } finally {
        reporter.close?.()
      }
    })
}
