import {UnknownActionError} from '../errors.js'
import {checkoutAction, gitSourceFetcher} from './builtin/checkout.js'
import {installPackagesAction, systemPackageInstaller} from './builtin/install-packages.js'
import {lintAction, scriptStaticChecker} from './builtin/lint.js'
import {cargoToolchainInvoker, toolchainAction} from './builtin/toolchain.js'
import type {Action, Collaborators} from './types.js'

export type {
  Action,
  ActionContext,
  ActionResult,
  Collaborators,
  PackageInstaller,
  SourceFetcher,
  StaticChecker,
  SubmoduleMode,
  ToolchainCommand,
  ToolchainInvoker,
  ToolchainRequest
} from './types.js'
export {runInShell} from './shell.js'

export const defaultCollaborators: Collaborators = {
  sourceFetcher: gitSourceFetcher,
  packageInstaller: systemPackageInstaller,
  toolchainInvoker: cargoToolchainInvoker,
  staticChecker: scriptStaticChecker
}

export class ActionRegistry {
  private readonly actions = new Map<string, Action>()

  constructor(actions: Action[]) {
    for (const action of actions) {
      this.actions.set(action.name, action)
    }
  }

  has(name: string): boolean {
    return this.actions.has(name)
  }

  get(name: string): Action {
    const action = this.actions.get(name)
    if (!action) {
      throw new UnknownActionError(name, this.names())
    }

    return action
  }

  names(): string[] {
    return [...this.actions.keys()]
  }
}

/**
 * Builds the registry of built-in actions, bound to the given collaborators.
 * Any collaborator not overridden uses its default shell-based implementation.
 */
export function createActionRegistry(overrides?: Partial<Collaborators>): ActionRegistry {
  const collaborators = {...defaultCollaborators, ...overrides}
  return new ActionRegistry([
    checkoutAction(collaborators.sourceFetcher),
    installPackagesAction(collaborators.packageInstaller),
    toolchainAction(collaborators.toolchainInvoker),
    lintAction(collaborators.staticChecker)
  ])
}
