import {execa} from 'execa'
import {CommandNotAvailableError} from '../errors.js'
import type {ShellName} from '../types.js'
import {CommandRunner, type OnLogLine} from './command-runner.js'
import type {RunCommandRequest, RunCommandResult} from './types.js'

export function shellInvocation(shell: ShellName, command: string): {file: string; args: string[]} {
  switch (shell) {
    case 'bash': {
      return {file: 'bash', args: ['--noprofile', '--norc', '-eo', 'pipefail', '-c', command]}
    }

    case 'sh': {
      return {file: 'sh', args: ['-e', '-c', command]}
    }

    case 'pwsh': {
      return {file: 'pwsh', args: ['-NoLogo', '-NoProfile', '-NonInteractive', '-Command', command]}
    }
  }
}

export class ShellCommandRunner extends CommandRunner {
  async check(shell: ShellName): Promise<void> {
    const {file, args} = shellInvocation(shell, 'exit 0')
    try {
      await execa(file, args)
    } catch (error) {
      throw new CommandNotAvailableError(file, {cause: error})
    }
  }

  async run(request: RunCommandRequest, onLogLine: OnLogLine): Promise<RunCommandResult> {
    const startedAt = new Date()
    const {file, args} = shellInvocation(request.shell, request.command)

    const proc = execa(file, args, {
      cwd: request.cwd,
      env: request.env,
      extendEnv: false,
      stdin: 'ignore',
      reject: false,
      cancelSignal: request.signal,
      timeout: request.timeoutSec ? request.timeoutSec * 1000 : undefined
    })

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line})
      }
    })()

    const result = await proc
    await Promise.allSettled([stdoutDone, stderrDone])

    return {
      exitCode: result.exitCode ?? 1,
      startedAt,
      finishedAt: new Date(),
      cancelled: result.isCanceled,
      timedOut: result.timedOut,
      error: result.failed && result.exitCode === undefined ? `${file} did not exit normally` : undefined
    }
  }
}
