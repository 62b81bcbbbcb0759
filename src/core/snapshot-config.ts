import {posix} from 'node:path'
import type {Instruction, SnapshotConfig} from '../types.js'

export const rootConfig: SnapshotConfig = Object.freeze({
  env: Object.freeze({}),
  workdir: '/',
  exposedPorts: Object.freeze([])
})

/** Resolves a container path against the current workdir. */
export function resolveContainerPath(workdir: string, path: string): string {
  return posix.resolve(workdir, path)
}

/**
 * Folds one instruction into the runtime metadata. `run` and `copy` leave it
 * unchanged. Returns a new frozen config; the input is never mutated.
 */
export function applyInstruction(config: SnapshotConfig, instruction: Instruction): SnapshotConfig {
  switch (instruction.kind) {
    case 'env': {
      return freezeConfig({...config, env: {...config.env, [instruction.name]: instruction.value}})
    }

    case 'workdir': {
      return freezeConfig({...config, workdir: resolveContainerPath(config.workdir, instruction.path)})
    }

    case 'expose': {
      const ports = new Set([...config.exposedPorts, instruction.port])
      return freezeConfig({...config, exposedPorts: [...ports].sort((a, b) => a - b)})
    }

    case 'entrypoint': {
      return freezeConfig({...config, entrypoint: [...instruction.command]})
    }

    case 'healthcheck': {
      const {healthcheck: _previous, ...rest} = config
      return instruction.healthcheck ? freezeConfig({...rest, healthcheck: instruction.healthcheck}) : freezeConfig(rest)
    }

    case 'run':
    case 'copy': {
      return config
    }
  }
}

function freezeConfig(config: SnapshotConfig): SnapshotConfig {
  return Object.freeze({
    ...config,
    env: Object.freeze(sortedRecord(config.env)),
    exposedPorts: Object.freeze([...config.exposedPorts]),
    entrypoint: config.entrypoint ? Object.freeze([...config.entrypoint]) : undefined
  })
}

function sortedRecord(record: Readonly<Record<string, string>>): Record<string, string> {
  const sorted: Record<string, string> = {}
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key]
  }

  return sorted
}
