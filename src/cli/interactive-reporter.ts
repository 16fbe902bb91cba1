import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {PipelineEvent, Reporter, StepFailedEvent} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'
import type {JobRef, SkipReason, StepRef} from '../types.js'

const skipLabels: Record<SkipReason, string> = {
  condition: '(condition)',
  cancelled: '(cancelled)',
  aborted: '(earlier step failed)'
}

/**
 * Reporter with interactive terminal UI using a spinner and colors.
 * Jobs interleave, so every line is prefixed with the job it belongs to and
 * a single spinner lists what is currently running.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly spinner: Ora
  private readonly running = new Map<string, string>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
    this.spinner = ora({prefixText: ' '})
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PIPELINE_START': {
        console.log(chalk.bold(`\n▶ Workflow: ${chalk.cyan(event.workflowName)} (${event.jobs.length} jobs)\n`))
        break
      }

      case 'JOB_STARTING': {
        this.print(`${chalk.bold(event.job.displayName)} ${chalk.gray(`on ${event.runsOn}`)}`)
        this.running.set(event.job.id, event.job.displayName)
        this.refresh()
        break
      }

      case 'JOB_SKIPPED': {
        this.print(`${chalk.gray('⊙')} ${chalk.gray(`${event.job.displayName} (condition)`)}`)
        break
      }

      case 'STEP_STARTING': {
        this.running.set(event.job.id, `${event.job.displayName} › ${event.step.displayName}`)
        this.refresh()
        break
      }

      case 'STEP_SKIPPED': {
        this.printStep(event.job, event.step, chalk.gray('⊙'), chalk.gray(`${event.step.displayName} ${skipLabels[event.reason]}`))
        break
      }

      case 'STEP_WOULD_RUN': {
        this.printStep(event.job, event.step, chalk.yellow('○'), chalk.yellow(`${event.step.displayName} (would run)`))
        break
      }

      case 'STEP_FINISHED': {
        this.printStep(event.job, event.step, chalk.green('✓'), chalk.green(`${event.step.displayName} (${formatDuration(event.durationMs)})`))
        this.stderrBuffers.delete(bufferKey(event.job, event.step))
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'STEP_LOG': {
        this.handleLog(event.job, event.step, event.stream, event.line)
        break
      }

      case 'JOB_FINISHED': {
        this.finishJob(event.job, chalk.green('✓'), chalk.green(`${event.job.displayName} passed (${formatDuration(event.durationMs)})`))
        break
      }

      case 'JOB_FAILED': {
        const detail = event.error ? `: ${event.error}` : ''
        this.finishJob(event.job, chalk.red('✗'), chalk.red(`${event.job.displayName} failed${detail}`))
        break
      }

      case 'JOB_CANCELLED': {
        this.finishJob(event.job, chalk.yellow('⊘'), chalk.yellow(`${event.job.displayName} cancelled`))
        break
      }

      case 'PIPELINE_FINISHED': {
        this.spinner.stop()
        const skipped = event.skipped > 0 ? `, ${event.skipped} skipped` : ''
        console.log(chalk.bold.green(`\n✓ Workflow completed (${event.passed} passed${skipped})\n`))
        break
      }

      case 'PIPELINE_FAILED': {
        this.spinner.stop()
        const cancelled = event.cancelled > 0 ? `, ${event.cancelled} cancelled` : ''
        console.log(chalk.bold.red(`\n✗ Workflow failed (${event.failed} failed${cancelled})\n`))
        break
      }
    }
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const exitInfo = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`
    const allowed = event.allowed ? ' (allowed to fail)' : ''
    this.printStep(event.job, event.step, chalk.red('✗'), chalk.red(`${event.step.displayName}${exitInfo}${allowed}`))

    const key = bufferKey(event.job, event.step)
    const stderr = this.stderrBuffers.get(key)
    if (stderr && stderr.length > 0) {
      this.print(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        this.print(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(key)
  }

  private handleLog(job: JobRef, step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.print(`${chalk.gray(`[${job.id}/${step.id}]`)} ${line}`)
    }

    if (stream === 'stderr') {
      const key = bufferKey(job, step)
      let buffer = this.stderrBuffers.get(key)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(key, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private finishJob(job: JobRef, symbol: string, text: string): void {
    this.running.delete(job.id)
    this.print(`${symbol} ${chalk.bold(text)}`)
    this.refresh()
  }

  private printStep(job: JobRef, step: StepRef, symbol: string, text: string): void {
    this.print(`  ${chalk.gray(`[${job.id}]`)} ${symbol} ${text}`)
  }

  private print(line: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear()
      console.log(line)
      this.spinner.render()
    } else {
      console.log(line)
    }
  }

  private refresh(): void {
    if (this.running.size === 0) {
      this.spinner.stop()
      return
    }

    this.spinner.text = [...this.running.values()].join(chalk.gray(' | '))
    if (!this.spinner.isSpinning) {
      this.spinner.start()
    }
  }
}

function bufferKey(job: JobRef, step: StepRef): string {
  return `${job.id}/${step.id}`
}
