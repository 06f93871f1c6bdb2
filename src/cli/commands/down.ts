import type {Command} from 'commander'
import {createOrchestrator, createReporter, loadContext} from '../utils.js'

export function registerDownCommand(program: Command): void {
  program
    .command('down')
    .description('Stop and remove containers and networks')
    .option('-t, --timeout <seconds>', 'Grace period before containers are killed', Number)
    .option('-v, --volumes', 'Remove named volumes too')
    .action(async (options: {timeout?: number; volumes?: boolean}, cmd: Command) => {
      const context = await loadContext(cmd)
      const orchestrator = createOrchestrator(context, createReporter(context))
      await orchestrator.down({
        volumes: options.volumes,
        timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000
      })
    })
}
