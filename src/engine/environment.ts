import process from 'node:process'
import {ExecutionError} from '../errors.js'
import type {ExecutionContext, JobSpec, OsFamily} from '../types.js'
import type {CommandRunner} from './command-runner.js'
import {ShellCommandRunner} from './shell-runner.js'

/**
 * An execution environment bound to one job for its whole lifetime.
 */
export type ExecutionEnvironment = {
  context: ExecutionContext;
  runner: CommandRunner;
  /** Called once the job is done with the environment. */
  release?: () => Promise<void>;
}

/**
 * Hands out execution environments. Implemented by the caller: a local host,
 * a pool of remote machines, containers...
 */
export type EnvironmentProvider = {
  acquire(job: JobSpec): Promise<ExecutionEnvironment>;
}

export function hostOsFamily(platform: NodeJS.Platform = process.platform): OsFamily {
  if (platform === 'darwin') {
    return 'macos'
  }

  if (platform === 'win32') {
    return 'windows'
  }

  return 'linux'
}

/** Guesses the OS family from a `runs-on` label such as "macos-latest". */
export function osFamilyFromLabel(label: string): OsFamily | undefined {
  const normalized = label.toLowerCase()
  if (normalized.startsWith('ubuntu') || normalized.startsWith('linux') || normalized.startsWith('debian')) {
    return 'linux'
  }

  if (normalized.startsWith('macos') || normalized.startsWith('osx')) {
    return 'macos'
  }

  if (normalized.startsWith('windows')) {
    return 'windows'
  }

  return undefined
}

/**
 * Runs every job on the current machine.
 *
 * With `strictHost`, a job whose `runs-on` label names another OS family
 * is refused instead of being run on the wrong host.
 */
export class LocalEnvironmentProvider implements EnvironmentProvider {
  private readonly runner: CommandRunner
  private readonly context: ExecutionContext

  constructor(private readonly options: {workdir: string; runner?: CommandRunner; strictHost?: boolean}) {
    this.runner = options.runner ?? new ShellCommandRunner()
    this.context = {os: hostOsFamily(), arch: process.arch, workdir: options.workdir}
  }

  async acquire(job: JobSpec): Promise<ExecutionEnvironment> {
    const wanted = osFamilyFromLabel(job.runsOn)
    if (this.options.strictHost && wanted !== undefined && wanted !== this.context.os) {
      throw new ExecutionError('HOST_MISMATCH', `Job ${job.id} runs on "${job.runsOn}" but this host is ${this.context.os}`)
    }

    return {context: {...this.context}, runner: this.runner}
  }
}
