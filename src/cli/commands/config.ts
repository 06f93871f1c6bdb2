import chalk from 'chalk'
import type {Command} from 'commander'
import {stringify} from 'yaml'
import {buildGraph, topologicalLevels} from '../../core/dag.js'
import {loadContext} from '../utils.js'

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Validate the descriptor and print the resolved stack')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {stack, json} = await loadContext(cmd)
      const levels = topologicalLevels(buildGraph(stack.services))

      if (json) {
        console.log(JSON.stringify({stack, startupOrder: levels}, null, 2))
        return
      }

      console.log(stringify(stack))
      console.log(chalk.bold('Startup order:'))
      for (const [i, level] of levels.entries()) {
        console.log(`  ${i + 1}. ${level.join(', ')}`)
      }
    })
}
