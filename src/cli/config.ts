import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {StratumConfig} from '../types.js'

export const configFilename = '.stratum.yml'

/**
 * Loads the project-level `.stratum.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<StratumConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  return validateConfig(parsed)
}

function validateConfig(parsed: unknown): StratumConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`${configFilename} must be a mapping`)
  }

  const config: StratumConfig = {}
  if ('store' in parsed && parsed.store !== undefined) {
    if (typeof parsed.store !== 'string') {
      throw new ValidationError(`${configFilename}: store must be a path`)
    }

    config.store = parsed.store
  }

  if ('bases' in parsed && parsed.bases !== undefined) {
    const {bases} = parsed
    if (typeof bases !== 'object' || bases === null || Array.isArray(bases)) {
      throw new ValidationError(`${configFilename}: bases must map base references to directories`)
    }

    config.bases = {}
    for (const [ref, dir] of Object.entries(bases)) {
      if (typeof dir !== 'string') {
        throw new ValidationError(`${configFilename}: base ${ref} must map to a directory`)
      }

      config.bases[ref] = dir
    }
  }

  return config
}
