import {defaultShell} from '../engine/index.js'
import type {ActionContext, ActionResult} from './types.js'

/** Runs a command line in the job's default shell. Used by the built-in collaborators. */
export async function runInShell(ctx: ActionContext, command: string): Promise<ActionResult> {
  const result = await ctx.runner.run({
    command,
    shell: defaultShell(ctx.context.os),
    cwd: ctx.context.workdir,
    env: ctx.env,
    timeoutSec: ctx.timeoutSec,
    signal: ctx.signal
  }, ctx.onLogLine)

  return {exitCode: result.exitCode}
}
