import chalk from 'chalk'
import type {Command} from 'commander'
import type {ServiceReport} from '../../core/orchestrator.js'
import type {ServiceState} from '../../core/service-state.js'
import {createOrchestrator, createReporter, loadContext} from '../utils.js'

const headers = ['SERVICE', 'STATE', 'CONTAINER', 'PORTS', 'RESTARTS'] as const

function colorState(state: ServiceState): string {
  switch (state) {
    case 'running':
    case 'healthy': {
      return chalk.green(state)
    }

    case 'failed':
    case 'unhealthy': {
      return chalk.red(state)
    }

    case 'restarting':
    case 'creating':
    case 'health-pending': {
      return chalk.yellow(state)
    }

    default: {
      return chalk.gray(state)
    }
  }
}

/** Rows of the `ps` table, unstyled. */
export function psRows(services: ServiceReport[]): string[][] {
  return services.map(service => [
    service.service,
    service.state,
    service.container,
    service.ports.join(', '),
    String(service.restarts)
  ])
}

export function registerPsCommand(program: Command): void {
  program
    .command('ps')
    .description('Show the state of each service')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const context = await loadContext(cmd)
      const orchestrator = createOrchestrator(context, createReporter(context))
      const services = await orchestrator.ps()

      if (context.json) {
        console.log(JSON.stringify(services, null, 2))
        return
      }

      const rows = psRows(services)
      const widths = headers.map((header, i) => Math.max(header.length, ...rows.map(row => row[i].length)))

      console.log(chalk.bold(headers.map((header, i) => header.padEnd(widths[i])).join('  ').trimEnd()))
      for (const [index, row] of rows.entries()) {
        const cells = row.map((cell, i) => cell.padEnd(widths[i]))
        cells[1] = colorState(services[index].state) + ' '.repeat(widths[1] - row[1].length)
        console.log(cells.join('  ').trimEnd())
      }
    })
}
