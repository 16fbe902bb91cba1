import type {ShellName} from '../types.js'

/**
 * Request to run one command in a shell.
 */
export type RunCommandRequest = {
  command: string;
  shell: ShellName;
  /** Absolute working directory. */
  cwd: string;
  /** Complete environment; the host environment is not inherited. */
  env: Record<string, string>;
  timeoutSec?: number;
  /** Aborting kills the running command. */
  signal?: AbortSignal;
}

export type RunCommandResult = {
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  /** True when the command was killed through `signal`. */
  cancelled?: boolean;
  timedOut?: boolean;
  error?: string;
}
