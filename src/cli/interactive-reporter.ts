import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {
  PhaseFailedEvent,
  PhaseFinishedEvent,
  PhaseLogEvent,
  PipelineEvent,
  PipelineFinishedEvent,
  Reporter
} from '../reporter.js'
import {formatDuration} from '../utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 */
export class InteractiveReporter implements Reporter {
  private static get maxLogLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly phaseSpinners = new Map<string, Ora>()
  private readonly logBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PIPELINE_START': {
        const mode = event.dryRun ? chalk.yellow(' (dry run)') : ''
        console.log(chalk.bold(`\n▶ Provisioning in ${chalk.cyan(event.workdir)}${mode}\n`))
        break
      }

      case 'PHASE_STARTING': {
        const spinner = ora({text: event.phase.displayName, prefixText: ' '}).start()
        this.phaseSpinners.set(event.phase.id, spinner)
        break
      }

      case 'PHASE_LOG': {
        this.handleLog(event)
        break
      }

      case 'PHASE_WARNING': {
        this.print(event.phase.id, `  ${chalk.yellow('⚠')} ${chalk.yellow(event.message)}`)
        break
      }

      case 'PHASE_FINISHED': {
        this.handlePhaseFinished(event)
        break
      }

      case 'PHASE_FAILED': {
        this.handlePhaseFailed(event)
        break
      }

      case 'PIPELINE_FINISHED': {
        this.handlePipelineFinished(event)
        break
      }

      case 'PIPELINE_FAILED': {
        console.log(chalk.bold.red(`\n✗ Provisioning failed in ${event.phase.displayName} (state: ${event.state})\n`))
        break
      }
    }
  }

  private print(phaseId: string, text: string): void {
    const spinner = this.phaseSpinners.get(phaseId)
    if (spinner) {
      spinner.clear()
      console.log(text)
      spinner.render()
    } else {
      console.log(text)
    }
  }

  private handleLog(event: PhaseLogEvent): void {
    if (this.verbose) {
      this.print(event.phase.id, `${chalk.gray(`  [${event.phase.id}]`)} ${event.line}`)
    }

    let buffer = this.logBuffers.get(event.phase.id)
    if (!buffer) {
      buffer = []
      this.logBuffers.set(event.phase.id, buffer)
    }

    buffer.push(event.line)
    if (buffer.length > InteractiveReporter.maxLogLines) {
      buffer.shift()
    }
  }

  private handlePhaseFinished(event: PhaseFinishedEvent): void {
    const spinner = this.phaseSpinners.get(event.phase.id)
    if (spinner) {
      spinner.stopAndPersist({
        symbol: chalk.green('✓'),
        text: chalk.green(`${event.phase.displayName} (${formatDuration(event.durationMs)})`)
      })
      this.phaseSpinners.delete(event.phase.id)
    }

    this.logBuffers.delete(event.phase.id)
  }

  private handlePhaseFailed(event: PhaseFailedEvent): void {
    const spinner = this.phaseSpinners.get(event.phase.id)
    if (spinner) {
      spinner.stopAndPersist({
        symbol: chalk.red('✗'),
        text: chalk.red(`${event.phase.displayName} [${event.code}]`)
      })
      this.phaseSpinners.delete(event.phase.id)
    }

    console.log(chalk.red(`  ${event.message}`))

    const lines = event.log ? event.log.split('\n') : (this.logBuffers.get(event.phase.id) ?? [])
    if (lines.length > 0) {
      console.log(chalk.red('  ── log ──'))
      for (const line of lines.slice(-InteractiveReporter.maxLogLines)) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.logBuffers.delete(event.phase.id)
  }

  private handlePipelineFinished(event: PipelineFinishedEvent): void {
    const summary = event.dryRun ? 'Dry run complete' : 'Provisioning complete'
    console.log(chalk.bold.green(`\n✓ ${summary} (${formatDuration(event.durationMs)})\n`))
  }
}
