import {resolve} from 'node:path'
import {StratumError} from '../errors.js'
import {baseFingerprint} from '../core/fingerprint.js'
import {rootConfig} from '../core/snapshot-config.js'
import type {Snapshot} from '../types.js'
import {digestSources, resolveSource} from './build-context.js'
import type {LayerStore} from './layer-store.js'

const imageReferencePattern = /^(?:[a-z\d.-]+(?::\d+)?\/)?[a-z\d]+(?:[._-][a-z\d]+)*(?:\/[a-z\d]+(?:[._-][a-z\d]+)*)*(?::\w[\w.-]{0,127})?(?:@sha256:[a-f\d]{64})?$/

export function isImageReference(ref: string): boolean {
  return imageReferencePattern.test(ref)
}

/**
 * Turns an external base identity into a root snapshot.
 */
export abstract class BaseResolver {
  /** Whether `ref` names a base this resolver can provide. */
  abstract accepts(ref: string): boolean

  /**
   * Returns the root snapshot for `ref`, committing it to the store if needed.
   */
  abstract resolve(ref: string, store: LayerStore): Promise<Snapshot>
}

/**
 * Every syntactically valid image reference maps to an empty root filesystem,
 * fingerprinted by its identity.
 */
export class ScratchBaseResolver extends BaseResolver {
  accepts(ref: string): boolean {
    return ref === 'scratch' || isImageReference(ref)
  }

  async resolve(ref: string, store: LayerStore): Promise<Snapshot> {
    const fingerprint = baseFingerprint(ref, 'scratch')
    return commitBase(store, fingerprint, ref)
  }
}

/**
 * Maps configured base identities to host directories. The directory content
 * is part of the base fingerprint, so editing it invalidates dependent layers.
 * References it does not know are delegated to `fallback`, when given.
 */
export class DirectoryBaseResolver extends BaseResolver {
  private readonly bases: Map<string, string>

  /**
   * @param bases - Base identity to directory
   * @param root - Directory relative paths are resolved against
   * @param fallback - Resolver for identities not in `bases`
   */
  constructor(
    bases: Record<string, string>,
    root: string,
    private readonly fallback?: BaseResolver
  ) {
    super()
    this.bases = new Map(Object.entries(bases).map(([ref, dir]) => [ref, resolve(root, dir)]))
  }

  accepts(ref: string): boolean {
    return this.bases.has(ref) || (this.fallback?.accepts(ref) ?? false)
  }

  async resolve(ref: string, store: LayerStore): Promise<Snapshot> {
    const dir = this.bases.get(ref)
    if (dir === undefined) {
      if (!this.fallback) {
        throw new StratumError('UNKNOWN_BASE', `No directory configured for base "${ref}"`)
      }

      return this.fallback.resolve(ref, store)
    }

    const source = await resolveSource(dir, ref)
    const fingerprint = baseFingerprint(ref, await digestSources(dir, [source]))
    return commitBase(store, fingerprint, ref, dir)
  }
}

async function commitBase(store: LayerStore, fingerprint: string, ref: string, fromDir?: string): Promise<Snapshot> {
  return store.withLock(fingerprint, async () => {
    const existing = await store.get(fingerprint)
    if (existing) {
      return existing
    }

    const staged = await store.stage(fingerprint, fromDir)
    const snapshot: Snapshot = {fingerprint, rootfs: fingerprint, config: rootConfig, base: ref}
    return store.put(fingerprint, snapshot, staged)
  })
}
