import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk, {type ChalkInstance} from 'chalk'
import type {Reporter, ServiceStateEvent, StackEvent} from '../core/reporter.js'
import type {ServiceState} from '../core/service-state.js'
import {formatDuration} from '../core/utils.js'

type ServiceDisplayState = {
  state: ServiceState;
  detail?: string;
  skipped?: boolean;
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const logColors: ChalkInstance[] = [chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow, chalk.green]

const stateLabels: Partial<Record<ServiceState, string>> = {
  creating: 'creating',
  'health-pending': 'waiting for health check',
  restarting: 'restarting',
  unhealthy: 'unhealthy',
  stopped: 'stopped'
}

/**
 * Reporter with a live per-service status board (log-update) while the
 * stack comes up, then prefixed container logs.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly showLogs: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly services = new Map<string, ServiceDisplayState>()
  private readonly stderrBuffers = new Map<string, string[]>()
  private readonly colors = new Map<string, ChalkInstance>()
  private nameWidth = 0
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {logs?: boolean}) {
    this.showLogs = options?.logs ?? false
  }

  emit(event: StackEvent): void {
    switch (event.event) {
      case 'STACK_START': {
        console.error(chalk.bold(`\n▶ Stack: ${chalk.cyan(event.project)}\n`))
        for (const [i, service] of event.services.entries()) {
          this.services.set(service, {state: 'defined'})
          this.colors.set(service, logColors[i % logColors.length])
        }

        this.nameWidth = Math.max(0, ...event.services.map(service => service.length))
        this.startRendering()
        break
      }

      case 'NETWORK_READY':
      case 'VOLUME_READY': {
        break
      }

      case 'SERVICE_STATE': {
        this.handleServiceState(event)
        break
      }

      case 'SERVICE_SKIPPED': {
        const service = this.services.get(event.service)
        if (service) {
          service.skipped = true
          service.detail = ` (${event.dependency} did not start)`
        }

        break
      }

      case 'SERVICE_FAILED': {
        const service = this.services.get(event.service)
        if (service) {
          service.detail = ` (${event.cause})`
        }

        if (!this.timer) {
          console.error(chalk.red(`  ✗ ${event.service}: ${event.message} (${event.cause})`))
        }

        break
      }

      case 'SERVICE_RESTARTING': {
        const exit = event.exitCode === undefined ? '' : `exited with ${event.exitCode}, `
        this.printLine(chalk.yellow(`  ↻ ${event.service} ${exit}restart #${event.attempt} in ${formatDuration(event.delayMs)}`))
        break
      }

      case 'SERVICE_LOG': {
        if (this.showLogs) {
          const color = this.colors.get(event.service) ?? chalk.gray
          this.printLine(`${color(event.service.padEnd(this.nameWidth))} | ${event.line}`)
        }

        if (event.stream === 'stderr') {
          let buffer = this.stderrBuffers.get(event.service)
          if (!buffer) {
            buffer = []
            this.stderrBuffers.set(event.service, buffer)
          }

          buffer.push(event.line)
          if (buffer.length > InteractiveReporter.maxStderrLines) {
            buffer.shift()
          }
        }

        break
      }

      case 'STACK_READY': {
        this.stopRendering()
        console.error(chalk.bold.green(`\n✓ Stack ready (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'STACK_FAILED': {
        this.stopRendering()
        this.printFailedStderr(event.failed)
        console.error(chalk.bold.red('\n✗ Stack did not fully start\n'))
        break
      }

      case 'STACK_STOPPING': {
        console.error(chalk.bold(`\n■ Stopping ${chalk.cyan(event.project)}`))
        break
      }

      case 'STACK_STOPPED': {
        console.error(chalk.bold.green(`✓ Stopped (${formatDuration(event.durationMs)})\n`))
        break
      }
    }
  }

  close(): void {
    if (this.timer) {
      this.stopRendering()
    }
  }

  private handleServiceState(event: ServiceStateEvent): void {
    const service = this.services.get(event.service)
    if (!service) {
      return
    }

    service.state = event.state
    service.skipped = false
    if (event.state === 'creating') {
      service.detail = undefined
    }

    // After startup only changes worth noticing get a line of their own
    if (!this.timer && (event.state === 'running' || event.state === 'failed' || event.state === 'unhealthy')) {
      this.printLine(`  ${this.symbolFor(service)} ${this.textFor(event.service, service)}`)
    }
  }

  private printLine(line: string): void {
    if (this.timer) {
      this.logUpdate.clear()
      console.error(line)
      this.render()
      return
    }

    console.error(line)
  }

  private render(): void {
    const lines: string[] = []
    for (const [name, service] of this.services) {
      lines.push(`  ${this.symbolFor(service)} ${this.textFor(name, service)}`)
    }

    this.logUpdate(lines.join('\n'))
    this.frame++
  }

  private symbolFor(service: ServiceDisplayState): string {
    if (service.skipped) {
      return chalk.gray('⊙')
    }

    switch (service.state) {
      case 'defined':
      case 'stopped': {
        return chalk.gray('○')
      }

      case 'creating':
      case 'health-pending':
      case 'restarting': {
        return chalk.cyan(spinnerFrames[this.frame % spinnerFrames.length])
      }

      case 'healthy':
      case 'running': {
        return chalk.green('✓')
      }

      case 'unhealthy':
      case 'failed': {
        return chalk.red('✗')
      }
    }
  }

  private textFor(name: string, service: ServiceDisplayState): string {
    const label = stateLabels[service.state]
    const text = `${name}${label ? ` ${label}` : ''}${service.detail ?? ''}`
    if (service.skipped) {
      return chalk.gray(`${name} skipped${service.detail ?? ''}`)
    }

    switch (service.state) {
      case 'defined':
      case 'stopped': {
        return chalk.gray(text)
      }

      case 'healthy':
      case 'running': {
        return chalk.green(text)
      }

      case 'unhealthy':
      case 'failed': {
        return chalk.red(text)
      }

      default: {
        return text
      }
    }
  }

  private startRendering(): void {
    if (!this.timer) {
      this.render()
      this.timer = setInterval(() => {
        this.render()
      }, 80)
    }
  }

  private stopRendering(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    this.render()
    this.logUpdate.done()
  }

  private printFailedStderr(failed: string[]): void {
    for (const name of failed) {
      const stderr = this.stderrBuffers.get(name)
      if (stderr?.length) {
        console.error(chalk.red(`  ── ${name} stderr ──`))
        for (const line of stderr) {
          console.error(chalk.red(`  ${line}`))
        }
      }
    }
  }
}
