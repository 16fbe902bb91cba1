import type {OsFamily, ShellName} from '../types.js'
import type {RunCommandRequest, RunCommandResult} from './types.js'

/**
 * Log line from command execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running shell commands inside an execution environment.
 *
 * Implementations:
 * - `ShellCommandRunner`: spawns local shells through execa
 * - Test doubles record requests instead of spawning anything
 */
export abstract class CommandRunner {
  /**
   * Verifies that the given shell can be started.
   * @throws CommandNotAvailableError if it cannot
   */
  abstract check(shell: ShellName): Promise<void>

  /**
   * Runs a command and streams its output line by line.
   * A non-zero exit is reported through `exitCode`, never thrown.
   */
  abstract run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult>
}

export function defaultShell(os: OsFamily): ShellName {
  return os === 'windows' ? 'pwsh' : 'bash'
}
