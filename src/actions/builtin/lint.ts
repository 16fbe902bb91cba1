import {runInShell} from '../shell.js'
import type {Action, StaticChecker} from '../types.js'

export const scriptStaticChecker: StaticChecker = {
  async check(ctx, {script}) {
    return runInShell(ctx, script ?? './scripts/lint.sh')
  }
}

export function lintAction(checker: StaticChecker): Action {
  return {
    name: 'lint',
    async run(ctx) {
      return checker.check(ctx, {script: ctx.inputs.script || undefined})
    }
  }
}
