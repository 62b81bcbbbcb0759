import {access, cp, mkdir, readFile, readdir, rename, rm, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {ImageNotFoundError, InvalidReferenceError, LayerNotFoundError, StoreError} from '../errors.js'
import {FingerprintLock} from '../core/fingerprint-lock.js'
import type {ImageDescriptor, Snapshot} from '../types.js'

/** A rootfs being prepared in `staging/` before it is committed as a layer. */
export type StagedLayer = {
  readonly id: string;
  readonly path: string;
  readonly rootfsPath: string;
}

/**
 * Content-addressed store of build layers and tagged images.
 *
 * Layout:
 * - **layers/{fingerprint}/snapshot.json**: snapshot metadata
 * - **layers/{fingerprint}/rootfs/**: files, only for layers that own a filesystem
 * - **staging/{id}/**: rootfs under construction (never read as a cache entry)
 * - **images/{tag}.json**: assembled image descriptors
 *
 * ## Layer Lifecycle
 *
 * 1. `stage()` creates `staging/{id}/rootfs/`, optionally as a copy of a parent rootfs
 * 2. The build step writes into the staged rootfs
 * 3. Success: `put()` atomically renames the staging dir to `layers/{fingerprint}/`
 *    OR Failure: `discard()` deletes `staging/{id}/`
 *
 * Layers are immutable once committed. Writing a fingerprint that already
 * exists is a no-op that returns the stored snapshot, since equal
 * fingerprints imply equal content.
 *
 * @example
 * ```typescript
 * const store = await LayerStore.open('/var/lib/stratum')
 * const staged = await store.stage(fp, store.rootfsPath(parent))
 * // ... write into staged.rootfsPath ...
 * await store.put(fp, snapshot, staged)
 * ```
 */
export class LayerStore {
  /**
   * Opens (and creates if needed) a store rooted at the given directory.
   * @param root - Store root directory
   */
  static async open(root: string): Promise<LayerStore> {
    await mkdir(join(root, 'layers'), {recursive: true})
    await mkdir(join(root, 'staging'), {recursive: true})
    await mkdir(join(root, 'images'), {recursive: true})
    return new LayerStore(root)
  }

  private readonly lock = new FingerprintLock()

  private constructor(readonly root: string) {}

  layerPath(fingerprint: string): string {
    validateFingerprint(fingerprint)
    return join(this.root, 'layers', fingerprint)
  }

  /**
   * Returns the directory holding the files of a snapshot.
   * @param snapshot - Snapshot (or any object naming its rootfs layer)
   */
  rootfsPath(snapshot: Pick<Snapshot, 'rootfs'>): string {
    return join(this.layerPath(snapshot.rootfs), 'rootfs')
  }

  /**
   * Looks up a committed snapshot.
   * @returns The snapshot, or undefined on a cache miss
   */
  async get(fingerprint: string): Promise<Snapshot | undefined> {
    let content: string
    try {
      content = await readFile(join(this.layerPath(fingerprint), 'snapshot.json'), 'utf8')
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return undefined
      }

      throw new StoreError('LAYER_READ_FAILED', `Failed to read layer ${fingerprint}`, {cause: error})
    }

    return JSON.parse(content) as Snapshot
  }

  /**
   * Like `get()`, but a miss is an error.
   * @throws LayerNotFoundError
   */
  async require(fingerprint: string): Promise<Snapshot> {
    const snapshot = await this.get(fingerprint)
    if (!snapshot) {
      throw new LayerNotFoundError(fingerprint)
    }

    return snapshot
  }

  /**
   * Host directory holding the files of an image.
   * @throws LayerNotFoundError if the layer owning them has been removed
   */
  async imageRootfs(image: Pick<ImageDescriptor, 'rootfs'>): Promise<string> {
    const owner = await this.require(image.rootfs)
    return this.rootfsPath(owner)
  }

  /**
   * Prepares a staging directory for a new rootfs.
   * @param fingerprint - Fingerprint the layer will be committed under
   * @param fromRootfs - Existing rootfs to copy (copy-on-write); empty when omitted
   */
  async stage(fingerprint: string, fromRootfs?: string): Promise<StagedLayer> {
    validateFingerprint(fingerprint)
    const id = `${fingerprint.slice(0, 16)}-${randomUUID().slice(0, 8)}`
    const path = join(this.root, 'staging', id)
    const rootfsPath = join(path, 'rootfs')
    try {
      await mkdir(path, {recursive: true})
      if (fromRootfs) {
        await cp(fromRootfs, rootfsPath, {recursive: true, verbatimSymlinks: true})
      } else {
        await mkdir(rootfsPath, {recursive: true})
      }
    } catch (error) {
      await rm(path, {recursive: true, force: true})
      throw new StoreError('STAGING_FAILED', `Failed to stage layer ${fingerprint}`, {cause: error})
    }

    return {id, path, rootfsPath}
  }

  /**
   * Commits a snapshot under its fingerprint.
   * When `staged` is given its rootfs becomes the layer's files.
   * @returns The stored snapshot (the existing one if the fingerprint was already committed)
   */
  async put(fingerprint: string, snapshot: Snapshot, staged?: StagedLayer): Promise<Snapshot> {
    const existing = await this.get(fingerprint)
    if (existing) {
      if (staged) {
        await this.discard(staged)
      }

      return existing
    }

    const target = this.layerPath(fingerprint)
    const source = staged ?? await this.stageMetadataOnly(fingerprint)
    try {
      await writeFile(join(source.path, 'snapshot.json'), JSON.stringify(snapshot, null, 2), 'utf8')
      await rename(source.path, target)
    } catch (error) {
      await this.discard(source)
      const raced = await this.get(fingerprint)
      if (raced) {
        return raced
      }

      throw new StoreError('LAYER_COMMIT_FAILED', `Failed to commit layer ${fingerprint}`, {cause: error})
    }

    return snapshot
  }

  /**
   * Discards a staged layer (on step failure or abort).
   */
  async discard(staged: StagedLayer): Promise<void> {
    await rm(staged.path, {recursive: true, force: true})
  }

  /**
   * Serializes work on one fingerprint within this process.
   */
  async withLock<T>(fingerprint: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(fingerprint, fn)
  }

  /**
   * Removes leftover staging directories from interrupted builds.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    try {
      const entries = await readdir(stagingDir, {withFileTypes: true})
      for (const entry of entries) {
        await rm(join(stagingDir, entry.name), {recursive: true, force: true})
      }
    } catch {
      // Staging directory doesn't exist yet
    }
  }

  /**
   * Lists committed layer fingerprints.
   */
  async listLayers(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.root, 'layers'), {withFileTypes: true})
      return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
    } catch {
      return []
    }
  }

  // -- Images ----------------------------------------------------------------

  imagePath(tag: string): string {
    validateTag(tag)
    return join(this.root, 'images', `${tag}.json`)
  }

  async saveImage(image: ImageDescriptor): Promise<void> {
    await writeFile(this.imagePath(image.name), JSON.stringify(image, null, 2) + '\n', 'utf8')
  }

  /**
   * @throws ImageNotFoundError
   */
  async loadImage(tag: string): Promise<ImageDescriptor> {
    try {
      const content = await readFile(this.imagePath(tag), 'utf8')
      return JSON.parse(content) as ImageDescriptor
    } catch (error: unknown) {
      if (isNotFound(error)) {
        throw new ImageNotFoundError(tag, {cause: error})
      }

      throw error
    }
  }

  async listImages(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.root, 'images'))
      return entries.filter(e => e.endsWith('.json')).map(e => e.slice(0, -'.json'.length)).sort()
    } catch {
      return []
    }
  }

  async removeImage(tag: string): Promise<boolean> {
    try {
      await access(this.imagePath(tag))
    } catch {
      return false
    }

    await rm(this.imagePath(tag), {force: true})
    return true
  }

  /**
   * Removes every layer not reachable from a tagged image.
   * @returns Number of layers removed
   */
  async prune(): Promise<number> {
    const keep = new Set<string>()
    for (const tag of await this.listImages()) {
      const image = await this.loadImage(tag)
      for (const fingerprint of image.layers) {
        keep.add(fingerprint)
        const snapshot = await this.get(fingerprint)
        if (snapshot) {
          keep.add(snapshot.rootfs)
        }
      }

      keep.add(image.rootfs)
    }

    let removed = 0
    for (const fingerprint of await this.listLayers()) {
      if (!keep.has(fingerprint)) {
        await rm(this.layerPath(fingerprint), {recursive: true, force: true})
        removed++
      }
    }

    return removed
  }

  private async stageMetadataOnly(fingerprint: string): Promise<StagedLayer> {
    const id = `${fingerprint.slice(0, 16)}-${randomUUID().slice(0, 8)}`
    const path = join(this.root, 'staging', id)
    await mkdir(path, {recursive: true})
    return {id, path, rootfsPath: join(path, 'rootfs')}
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function validateFingerprint(fingerprint: string): void {
  if (!/^[a-f\d]{64}$/.test(fingerprint)) {
    throw new InvalidReferenceError('fingerprint', fingerprint)
  }
}

function validateTag(tag: string): void {
  if (!/^[\w][\w.-]*$/.test(tag) || tag.includes('..')) {
    throw new InvalidReferenceError('image tag', tag)
  }
}
