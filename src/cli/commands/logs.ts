import process from 'node:process'
import type {Command} from 'commander'
import {createOrchestrator, createReporter, loadContext} from '../utils.js'

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show the output of a service container')
    .argument('<service>', 'Service name')
    .option('-f, --follow', 'Keep streaming new output')
    .action(async (service: string, options: {follow?: boolean}, cmd: Command) => {
      const context = await loadContext(cmd)
      const orchestrator = createOrchestrator(context, createReporter(context))

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      try {
        await orchestrator.logs(service, log => {
          if (log.stream === 'stderr') {
            process.stderr.write(`${log.line}\n`)
          } else {
            process.stdout.write(`${log.line}\n`)
          }
        }, {follow: options.follow, signal: controller.signal})
      } finally {
        process.off('SIGINT', onSignal)
      }
    })
}
