import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {
  ActionContext,
  Collaborators,
  SubmoduleMode,
  ToolchainRequest
} from '../actions/index.js'
import type {PipelineEvent, Reporter} from '../core/reporter.js'
import {
  CommandRunner,
  type EnvironmentProvider,
  type ExecutionEnvironment,
  type OnLogLine,
  type RunCommandRequest,
  type RunCommandResult
} from '../engine/index.js'
import type {ExecutionContext, JobSpec, ShellName} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'gridci-test-'))
}

/**
 * Silent reporter — all events are dropped.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]} {
  const events: PipelineEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/** Event names in emission order, optionally only those about one job. */
export function eventNames(events: PipelineEvent[], jobId?: string): string[] {
  return events
    .filter(event => jobId === undefined || ('job' in event && event.job.id === jobId))
    .map(event => event.event)
}

export type Respond = (request: RunCommandRequest, onLogLine: OnLogLine) => number | Promise<number>

/**
 * Command runner that records requests instead of spawning anything.
 * Every command exits with the code `respond` returns (0 by default).
 */
export class RecordingCommandRunner extends CommandRunner {
  readonly requests: RunCommandRequest[] = []
  readonly checked: ShellName[] = []

  constructor(private readonly respond: Respond = () => 0) {
    super()
  }

  async check(shell: ShellName): Promise<void> {
    this.checked.push(shell)
  }

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    this.requests.push(request)
    const startedAt = new Date()
    const exitCode = await this.respond(request, onLogLine)
    return {exitCode, startedAt, finishedAt: new Date()}
  }

  get commands(): string[] {
    return this.requests.map(request => request.command)
  }
}

export const linuxContext: ExecutionContext = {os: 'linux', arch: 'x64', workdir: '/work'}

/**
 * Hands out one environment per job, all sharing the same runner,
 * and records which jobs acquired and released one.
 */
export class FakeEnvironmentProvider implements EnvironmentProvider {
  readonly acquired: string[] = []
  readonly released: string[] = []

  constructor(
    private readonly runner: CommandRunner,
    private readonly context: ExecutionContext = linuxContext
  ) {}

  async acquire(job: JobSpec): Promise<ExecutionEnvironment> {
    this.acquired.push(job.id)
    return {
      context: {...this.context},
      runner: this.runner,
      release: async () => {
        this.released.push(job.id)
      }
    }
  }
}

export type CollaboratorCall =
  | {kind: 'fetch'; job: string; submodules: SubmoduleMode}
  | {kind: 'install'; job: string; packages: string[]}
  | {kind: 'toolchain'; job: string; request: ToolchainRequest; env: Record<string, string>}
  | {kind: 'lint'; job: string; script?: string}

/**
 * Collaborators that record their invocations.
 * `exitCode` picks the exit code of each call (0 by default).
 */
export function recordingCollaborators(exitCode: (call: CollaboratorCall, ctx: ActionContext) => number = () => 0): {collaborators: Collaborators; calls: CollaboratorCall[]} {
  const calls: CollaboratorCall[] = []
  const record = (call: CollaboratorCall, ctx: ActionContext) => {
    calls.push(call)
    return {exitCode: exitCode(call, ctx)}
  }

  const collaborators: Collaborators = {
    sourceFetcher: {
      async fetch(ctx, {submodules}) {
        return record({kind: 'fetch', job: ctx.job.id, submodules}, ctx)
      }
    },
    packageInstaller: {
      async install(ctx, packages) {
        return record({kind: 'install', job: ctx.job.id, packages}, ctx)
      }
    },
    toolchainInvoker: {
      async invoke(ctx, request) {
        return record({kind: 'toolchain', job: ctx.job.id, request, env: ctx.env}, ctx)
      }
    },
    staticChecker: {
      async check(ctx, {script}) {
        return record({kind: 'lint', job: ctx.job.id, script}, ctx)
      }
    }
  }

  return {collaborators, calls}
}
