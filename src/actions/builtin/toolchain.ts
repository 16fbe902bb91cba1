import {MissingInputError} from '../../errors.js'
import {runInShell} from '../shell.js'
import type {Action, ToolchainCommand, ToolchainInvoker, ToolchainRequest} from '../types.js'

const commands = new Set<string>(['install', 'target-add', 'build', 'test'])

function isToolchainCommand(value: string | undefined): value is ToolchainCommand {
  return value !== undefined && commands.has(value)
}

/** Command line for a toolchain request, using rustup and cargo. */
export function toolchainCommandLine({command, target, toolchain}: ToolchainRequest): string {
  const targetFlag = target ? ` --target ${target}` : ''
  switch (command) {
    case 'install': {
      const channel = toolchain ?? 'stable'
      return `rustup update ${channel} --no-self-update && rustup default ${channel}`
    }

    case 'target-add': {
      return `rustup target add ${target ?? ''}`.trimEnd()
    }

    case 'build': {
      return `cargo build${targetFlag}`
    }

    case 'test': {
      return `cargo test${targetFlag}`
    }
  }
}

export const cargoToolchainInvoker: ToolchainInvoker = {
  async invoke(ctx, request) {
    return runInShell(ctx, toolchainCommandLine(request))
  }
}

function parseRequest(inputs: Record<string, string>): ToolchainRequest {
  const {command, target, toolchain} = inputs
  if (!isToolchainCommand(command)) {
    throw new MissingInputError('toolchain', `command (${[...commands].join(', ')})`)
  }

  if (command === 'target-add' && !target) {
    throw new MissingInputError('toolchain', 'target')
  }

  return {
    command,
    target: target || undefined,
    toolchain: toolchain || undefined
  }
}

export function toolchainAction(invoker: ToolchainInvoker): Action {
  return {
    name: 'toolchain',
    validate(inputs) {
      parseRequest(inputs)
    },
    async run(ctx) {
      return invoker.invoke(ctx, parseRequest(ctx.inputs))
    }
  }
}
