#!/usr/bin/env node
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {registerConfigCommand} from './commands/config.js'
import {registerDownCommand} from './commands/down.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerPsCommand} from './commands/ps.js'
import {registerUpCommand} from './commands/up.js'
import {exitCodeFor, formatFailure} from './exit-codes.js'

async function main() {
  const program = new Command()

  program
    .name('berth')
    .description('Compose-style orchestrator for multi-container stacks')
    .version('0.1.0')
    .option('-f, --file <path>', 'Descriptor file or directory (default: current directory)')
    .option('-p, --project-name <name>', 'Project name (default: descriptor name or directory)')
    .option('--workdir <path>', 'State directory (default: $BERTH_WORKDIR or .berth)')
    .option('--json', 'Output structured JSON logs')

  registerUpCommand(program)
  registerDownCommand(program)
  registerPsCommand(program)
  registerConfigCommand(program)
  registerLogsCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error(chalk.red(formatFailure(error)))
  process.exitCode = exitCodeFor(error)
}
