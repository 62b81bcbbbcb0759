import process from 'node:process'
import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import {type Reporter, type StepRef, type StratumEvent, stepLabel} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'
import type {HealthState} from '../types.js'

const stateColors: Record<HealthState, (text: string) => string> = {
  Starting: chalk.yellow,
  Ready: chalk.cyan,
  Healthy: chalk.green,
  Unhealthy: chalk.red,
  Terminated: chalk.gray
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stepSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()
  private readonly processes = new Set<string>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: StratumEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        console.error(chalk.bold(`\n▶ Building ${chalk.cyan(event.recipe)} (target ${event.target})\n`))
        break
      }

      case 'STAGE_START': {
        console.error(chalk.bold(`  ${event.stage}`) + chalk.gray(` from ${event.base}`))
        break
      }

      case 'STEP_CACHED': {
        const spinner = this.stepSpinners.get(stepLabel(event.step))
        const text = chalk.gray(`${event.step.summary} (cached)`)
        if (spinner) {
          spinner.stopAndPersist({symbol: chalk.gray('⊙'), text})
          this.stepSpinners.delete(stepLabel(event.step))
        } else {
          console.error(`    ${chalk.gray('⊙')} ${text}`)
        }

        break
      }

      case 'STEP_STARTING': {
        const spinner = ora({text: event.step.summary, prefixText: '   ', stream: process.stderr}).start()
        this.stepSpinners.set(stepLabel(event.step), spinner)
        break
      }

      case 'STEP_FINISHED': {
        this.finishStep(event.step, chalk.green('✓'), chalk.green(`${event.step.summary} (${formatDuration(event.durationMs)})`))
        this.stderrBuffers.delete(stepLabel(event.step))
        break
      }

      case 'STEP_FAILED': {
        this.finishStep(event.step, chalk.red('✗'), chalk.red(`${event.step.summary} (exit ${event.exitCode})`))
        this.printStderr(stepLabel(event.step))
        break
      }

      case 'STAGE_FINISHED': {
        console.error(chalk.gray(`    → ${event.snapshot.slice(0, 12)} (${event.executed} executed, ${event.cached} cached)\n`))
        break
      }

      case 'IMAGE_ASSEMBLED': {
        break
      }

      case 'BUILD_FINISHED': {
        console.error(chalk.bold.green(`✓ Built ${event.image}`) + chalk.gray(` ${event.digest.slice(0, 12)} in ${formatDuration(event.durationMs)}\n`))
        break
      }

      case 'BUILD_FAILED': {
        for (const spinner of this.stepSpinners.values()) {
          spinner.stop()
        }

        this.stepSpinners.clear()
        console.error(chalk.bold.red(`\n✗ Build failed: ${event.message}\n`))
        break
      }

      case 'PROCESS_STARTED': {
        this.processes.add(event.image)
        console.error(chalk.bold(`▶ ${chalk.cyan(event.image)}: ${event.command.join(' ')}`) + chalk.gray(event.pid === undefined ? '' : ` (pid ${event.pid})`))
        break
      }

      case 'STATE_CHANGED': {
        console.error(`  ${chalk.gray(event.from)} → ${stateColors[event.to](event.to)}`)
        break
      }

      case 'PROBE_FAILED': {
        const reason = event.timedOut ? 'timed out' : `exit ${event.exitCode ?? '?'}`
        console.error(chalk.yellow(`  healthcheck failed (${reason}, ${event.consecutiveFailures} in a row)`))
        break
      }

      case 'RUNTIME_ERROR': {
        console.error(chalk.red(`  ${event.message}`))
        break
      }

      case 'PROCESS_EXITED': {
        const status = event.signal ? `signal ${event.signal}` : `code ${event.exitCode ?? '?'}`
        console.error(chalk.bold(`■ ${event.image} exited (${status})`))
        break
      }
    }
  }

  log(source: string, stream: 'stdout' | 'stderr', line: string): void {
    if (this.processes.has(source)) {
      const output = stream === 'stderr' ? process.stderr : process.stdout
      output.write(`${line}\n`)
      return
    }

    if (this.verbose) {
      const spinner = this.stepSpinners.get(source)
      const prefix = chalk.gray(`    [${source}]`)
      if (spinner) {
        spinner.clear()
        console.error(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.error(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(source)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(source, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private finishStep(step: StepRef, symbol: string, text: string): void {
    const spinner = this.stepSpinners.get(stepLabel(step))
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.stepSpinners.delete(stepLabel(step))
    } else {
      console.error(`    ${symbol} ${text}`)
    }
  }

  private printStderr(label: string): void {
    const stderr = this.stderrBuffers.get(label)
    if (stderr && stderr.length > 0) {
      console.error(chalk.red('    ── stderr ──'))
      for (const line of stderr) {
        console.error(chalk.red(`    ${line}`))
      }
    }

    this.stderrBuffers.delete(label)
  }
}
