import {MissingInputError} from '../../errors.js'
import {runInShell} from '../shell.js'
import type {Action, PackageInstaller} from '../types.js'

/** Installs packages with the host's package manager (apt, Homebrew or Chocolatey). */
export const systemPackageInstaller: PackageInstaller = {
  async install(ctx, packages) {
    if (packages.length === 0) {
      return {exitCode: 0}
    }

    const list = packages.join(' ')
    switch (ctx.context.os) {
      case 'linux': {
        return runInShell(ctx, `sudo apt-get update && sudo apt-get install -y ${list}`)
      }

      case 'macos': {
        return runInShell(ctx, `brew install ${list}`)
      }

      case 'windows': {
        return runInShell(ctx, `choco install -y ${list}`)
      }
    }
  }
}

export function splitPackages(value: string): string[] {
  return value.split(/\s+/).filter(Boolean)
}

export function installPackagesAction(installer: PackageInstaller): Action {
  return {
    name: 'install-packages',
    validate(inputs) {
      if (inputs.packages === undefined) {
        throw new MissingInputError('install-packages', 'packages')
      }
    },
    async run(ctx) {
      return installer.install(ctx, splitPackages(ctx.inputs.packages ?? ''))
    }
  }
}
