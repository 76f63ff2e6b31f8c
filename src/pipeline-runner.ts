import {ProvisionError} from './errors.js'
import type {ProvisionConfig} from './config.js'
import type {Workspace} from './engine/workspace.js'
import {phases as defaultPhases, type PhaseServices, type PipelinePhase, type PipelineState, type ProvisionContext} from './phases.js'
import type {PhaseRef, Reporter} from './reporter.js'

export type PipelineRunOptions = {
  /** Stop once the answer file and configuration files are written */
  dryRun?: boolean;
}

export type PipelineOutcome = {
  state: PipelineState;
  context: ProvisionContext;
}

const lastDryRunPhase = 'build-artifact'

function phaseRef(phase: PipelinePhase): PhaseRef {
  return {id: phase.id, displayName: phase.displayName}
}

function errorLog(error: unknown): string | undefined {
  if (error instanceof ProvisionError && 'log' in error && typeof error.log === 'string' && error.log) {
    return error.log
  }

  return undefined
}

/**
 * Drives a provisioning run through its phases.
 *
 * ## Workflow
 *
 * 1. Phases run strictly in order; each one moves the run to its target state
 * 2. Each phase reads what earlier phases put in the {@link ProvisionContext}
 *    and fails with PhasePreconditionError when something is missing
 * 3. A failed phase reports PHASE_FAILED (with the captured process log, if any)
 *    and PIPELINE_FAILED, then the original error propagates
 * 4. A phase never runs twice: retryable phases retry within their own bound
 *
 * ## Teardown
 *
 * A virtual machine session left in the context is disposed on every exit
 * path. A teardown failure is reported as a warning and never replaces the
 * outcome of the run.
 */
export class PipelineRunner {
  private current: PipelineState = 'Idle'

  constructor(
    private readonly services: PhaseServices,
    private readonly reporter: Reporter,
    private readonly phases: readonly PipelinePhase[] = defaultPhases
  ) {}

  get state(): PipelineState {
    return this.current
  }

  async run(config: ProvisionConfig, workspace: Workspace, options?: PipelineRunOptions): Promise<PipelineOutcome> {
    const dryRun = options?.dryRun ?? false
    const startedAt = Date.now()
    const context: ProvisionContext = {config, workspace}
    this.current = 'Idle'

    const selected = dryRun ? this.phasesUntil(lastDryRunPhase) : this.phases
    this.reporter.emit({event: 'PIPELINE_START', workdir: workspace.root, phases: selected.map(phaseRef), dryRun})

    try {
      for (const phase of selected) {
        await this.runPhase(phase, context)
      }

      if (!dryRun) {
        this.current = 'Done'
      }

      this.reporter.emit({event: 'PIPELINE_FINISHED', state: this.current, durationMs: Date.now() - startedAt, dryRun})
      return {state: this.current, context}
    } finally {
      await this.teardown(context)
    }
  }

  private phasesUntil(id: string): readonly PipelinePhase[] {
    const index = this.phases.findIndex(phase => phase.id === id)
    return index === -1 ? this.phases : this.phases.slice(0, index + 1)
  }

  private async runPhase(phase: PipelinePhase, context: ProvisionContext): Promise<void> {
    const ref = phaseRef(phase)
    this.reporter.emit({event: 'PHASE_STARTING', phase: ref})
    const startedAt = Date.now()
    if (phase.entering) {
      this.current = phase.entering
    }

    try {
      await phase.run({
        context,
        services: this.services,
        log: (stream, line) => {
          this.reporter.emit({event: 'PHASE_LOG', phase: ref, stream, line})
        },
        warn: message => {
          this.reporter.emit({event: 'PHASE_WARNING', phase: ref, message})
        }
      })
    } catch (error) {
      this.reporter.emit({
        event: 'PHASE_FAILED',
        phase: ref,
        failure: phase.failure,
        code: error instanceof ProvisionError ? error.code : 'UNEXPECTED',
        message: error instanceof Error ? error.message : String(error),
        log: errorLog(error)
      })
      this.reporter.emit({event: 'PIPELINE_FAILED', state: this.current, phase: ref})
      throw error
    }

    this.current = phase.target
    this.reporter.emit({event: 'PHASE_FINISHED', phase: ref, state: this.current, durationMs: Date.now() - startedAt})
  }

  private async teardown(context: ProvisionContext): Promise<void> {
    const {session} = context
    if (!session || session.disposed) {
      return
    }

    try {
      await session.dispose()
    } catch (error) {
      this.reporter.emit({
        event: 'PHASE_WARNING',
        phase: {id: 'teardown', displayName: 'Teardown'},
        message: `Failed to stop ${session.name}: ${error instanceof Error ? error.message : String(error)}`
      })
    }
  }
}
