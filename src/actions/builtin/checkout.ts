import {MissingInputError} from '../../errors.js'
import {runInShell} from '../shell.js'
import type {Action, SourceFetcher, SubmoduleMode} from '../types.js'

/**
 * Updates submodules of an already cloned working tree.
 * The tree itself is provided by the execution environment.
 */
export const gitSourceFetcher: SourceFetcher = {
  async fetch(ctx, {submodules}) {
    if (submodules === 'none') {
      return {exitCode: 0}
    }

    const recursive = submodules === 'recursive' ? ' --recursive' : ''
    return runInShell(ctx, `git submodule update --init${recursive}`)
  }
}

export function parseSubmodules(value: string | undefined): SubmoduleMode {
  switch (value) {
    case undefined:
    case '':
    case 'false': {
      return 'none'
    }

    case 'true': {
      return 'top'
    }

    case 'recursive': {
      return 'recursive'
    }

    default: {
      throw new MissingInputError('checkout', 'submodules (true, false or recursive)')
    }
  }
}

export function checkoutAction(fetcher: SourceFetcher): Action {
  return {
    name: 'checkout',
    validate(inputs) {
      parseSubmodules(inputs.submodules)
    },
    async run(ctx) {
      return fetcher.fetch(ctx, {submodules: parseSubmodules(ctx.inputs.submodules)})
    }
  }
}
