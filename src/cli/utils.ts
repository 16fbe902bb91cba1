import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {ConfigurationError, GridError} from '../errors.js'

export type GlobalOptions = {
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export const workflowFilenames = ['gridci.yml', 'gridci.yaml', 'gridci.json', join('.github', 'workflows', 'ci.yml')]

export async function resolveWorkflowFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new ConfigurationError('VALIDATION_ERROR', `Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of workflowFilenames) {
    const candidate = join(target, filename)
    if (await exists(candidate)) {
      return candidate
    }
  }

  throw new ConfigurationError(
    'VALIDATION_ERROR',
    `No workflow file found in ${target}. Expected one of: ${workflowFilenames.join(', ')}`
  )
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(() => true, () => false)
}

/** Splits a repeatable or comma-separated option into its values. */
export function splitList(values: string[] | undefined): string[] | undefined {
  if (!values) {
    return undefined
  }

  return values.flatMap(value => value.split(',')).map(value => value.trim()).filter(Boolean)
}

export function collect(value: string, previous: string[] | undefined): string[] {
  return [...previous ?? [], value]
}

export function parseConcurrency(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError('VALIDATION_ERROR', `Invalid concurrency: "${value}" (expected a positive integer)`)
  }

  return parsed
}

/**
 * Exit code for an error that escaped a command:
 * 2 for configuration errors, 1 otherwise.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? 2 : 1
}

export function describeError(error: unknown): string {
  if (error instanceof GridError) {
    return `${error.message} [${error.code}]`
  }

  return error instanceof Error ? error.message : String(error)
}
