import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'

export type EnvMap = Record<string, string>

/**
 * Layers environment maps: base < job overlay < step overlay.
 * Later layers overwrite keys of earlier ones; inputs are never mutated.
 */
export function composeEnv(base: EnvMap, job?: EnvMap, step?: EnvMap): EnvMap {
  return {...base, ...job, ...step}
}

/** Snapshot of the host process environment without unset entries. */
export function hostEnv(): EnvMap {
  const env: EnvMap = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value
    }
  }

  return env
}

export async function loadEnvFile(filePath: string): Promise<EnvMap> {
  const content = await readFile(filePath, 'utf8')
  return parse(content)
}
