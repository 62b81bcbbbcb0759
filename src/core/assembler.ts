import {InvalidHealthcheckError, NoEntrypointError} from '../errors.js'
import type {Healthcheck, ImageDescriptor, Snapshot, SnapshotConfig} from '../types.js'
import {canonicalJson, sha256} from './fingerprint.js'
import {ancestry, type BuildPlan} from './planner.js'
import {applyInstruction, rootConfig} from './snapshot-config.js'

export type AssembleOptions = {
  plan: BuildPlan;
  target: string;
  /** Final snapshot of the target stage. */
  snapshot: Snapshot;
  /** Fingerprints from the external base to the final step. */
  layers: readonly string[];
  /** Image tag. */
  name: string;
}

/**
 * Folds the runtime metadata of the target's ancestry (root first) into an
 * immutable image descriptor.
 *
 * @throws NoEntrypointError if no stage of the ancestry sets an entrypoint
 * @throws InvalidHealthcheckError for non-positive interval/timeout, a negative start period or bad retries
 */
export function assembleImage(options: AssembleOptions): ImageDescriptor {
  const chain = ancestry(options.plan, options.target)
  let config: SnapshotConfig = rootConfig
  for (const planned of chain) {
    for (const instruction of planned.stage.instructions) {
      config = applyInstruction(config, instruction)
    }
  }

  if (!config.entrypoint || config.entrypoint.length === 0) {
    throw new NoEntrypointError(options.target)
  }

  if (config.healthcheck) {
    validateHealthcheck(options.target, config.healthcheck)
  }

  const body = {
    schemaVersion: 1 as const,
    name: options.name,
    stage: options.target,
    snapshot: options.snapshot.fingerprint,
    rootfs: options.snapshot.rootfs,
    layers: [...options.layers],
    exposedPorts: [...config.exposedPorts],
    env: {...config.env},
    workdir: config.workdir,
    entrypoint: [...config.entrypoint],
    ...(config.healthcheck ? {healthcheck: {...config.healthcheck, command: [...config.healthcheck.command]}} : {})
  }

  return deepFreeze({...body, digest: sha256('image', canonicalJson(body))})
}

/**
 * Recomputes the digest of a descriptor, e.g. to verify one read from disk.
 */
export function imageDigest(image: ImageDescriptor): string {
  const {digest: _digest, ...body} = image
  return sha256('image', canonicalJson(body))
}

function validateHealthcheck(stage: string, healthcheck: Healthcheck): void {
  if (!(healthcheck.intervalMs > 0)) {
    throw new InvalidHealthcheckError(stage, `interval must be positive, got ${healthcheck.intervalMs}ms`)
  }

  if (!(healthcheck.timeoutMs > 0)) {
    throw new InvalidHealthcheckError(stage, `timeout must be positive, got ${healthcheck.timeoutMs}ms`)
  }

  if (!(healthcheck.startPeriodMs >= 0)) {
    throw new InvalidHealthcheckError(stage, `start period must not be negative, got ${healthcheck.startPeriodMs}ms`)
  }

  if (!Number.isInteger(healthcheck.retries) || healthcheck.retries < 1) {
    throw new InvalidHealthcheckError(stage, `retries must be a positive integer, got ${healthcheck.retries}`)
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      deepFreeze(entry)
    }

    Object.freeze(value)
  }

  return value
}
