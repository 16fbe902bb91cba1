import type {CommandRunner, OnLogLine} from '../engine/index.js'
import type {ExecutionContext, JobSpec, StepRef} from '../types.js'

/** Everything an action sees of the job it runs in. */
export type ActionContext = {
  job: JobSpec;
  step: StepRef;
  context: ExecutionContext;
  runner: CommandRunner;
  /** Fully composed environment for this step. */
  env: Record<string, string>;
  /** `with:` inputs, rendered against the job's fields. */
  inputs: Record<string, string>;
  signal: AbortSignal;
  timeoutSec?: number;
  onLogLine: OnLogLine;
}

export type ActionResult = {
  exitCode: number;
}

export type Action = {
  name: string;
  /** Checks rendered inputs while planning; throws a ConfigurationError. */
  validate?(inputs: Record<string, string>): void;
  run(ctx: ActionContext): Promise<ActionResult>;
}

// -- Collaborators -----------------------------------------------------------

export type SubmoduleMode = 'none' | 'top' | 'recursive'

/** Materializes the working tree, nested sub-trees included. */
export type SourceFetcher = {
  fetch(ctx: ActionContext, options: {submodules: SubmoduleMode}): Promise<ActionResult>;
}

/** Installs system-level build dependencies. */
export type PackageInstaller = {
  install(ctx: ActionContext, packages: string[]): Promise<ActionResult>;
}

export type ToolchainCommand = 'install' | 'target-add' | 'build' | 'test'

export type ToolchainRequest = {
  command: ToolchainCommand;
  target?: string;
  toolchain?: string;
}

/** Runs the compiler toolchain for a target triple. */
export type ToolchainInvoker = {
  invoke(ctx: ActionContext, request: ToolchainRequest): Promise<ActionResult>;
}

/** Lint pass over the working tree. */
export type StaticChecker = {
  check(ctx: ActionContext, options: {script?: string}): Promise<ActionResult>;
}

export type Collaborators = {
  sourceFetcher: SourceFetcher;
  packageInstaller: PackageInstaller;
  toolchainInvoker: ToolchainInvoker;
  staticChecker: StaticChecker;
}
