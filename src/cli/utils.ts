import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {isEnvName} from '../core/env-file.js'
import {ValidationError} from '../errors.js'
import {LayerStore} from '../engine/layer-store.js'
import type {StratumConfig} from '../types.js'
import {loadConfig} from './config.js'

export type GlobalOptions = {
  store?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Store root, by precedence: `--store`, `STRATUM_STORE`, config `store`
 * (relative to the config directory), then `./.stratum`.
 */
export function resolveStorePath(options: {
  flag?: string;
  env?: NodeJS.ProcessEnv;
  config: StratumConfig;
  configDir: string;
  cwd?: string;
}): string {
  const cwd = options.cwd ?? process.cwd()
  const fromEnv = (options.env ?? process.env).STRATUM_STORE
  if (options.flag) {
    return resolve(cwd, options.flag)
  }

  if (fromEnv) {
    return resolve(cwd, fromEnv)
  }

  if (options.config.store) {
    return resolve(options.configDir, options.config.store)
  }

  return resolve(cwd, '.stratum')
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

/**
 * Parses `KEY=VALUE` pairs. The value may be empty or contain `=`.
 * @throws ValidationError for a pair without `=` or with an invalid name
 */
export function parseEnvPairs(pairs: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {}
  for (const pair of pairs) {
    const separator = pair.indexOf('=')
    const name = separator === -1 ? pair : pair.slice(0, separator)
    if (separator === -1 || !isEnvName(name)) {
      throw new ValidationError(`Invalid environment variable "${pair}" (expected KEY=VALUE)`)
    }

    env[name] = pair.slice(separator + 1)
  }

  return env
}

/**
 * Loads `.stratum.yml` from the working directory and opens the store the
 * global options point at.
 */
export async function openProject(cmd: Command): Promise<{store: LayerStore; config: StratumConfig; json: boolean}> {
  const {store: flag, json} = getGlobalOptions(cmd)
  const configDir = process.cwd()
  const config = await loadConfig(configDir)
  const store = await LayerStore.open(resolveStorePath({flag, config, configDir}))
  return {store, config, json: json ?? false}
}
