/**
 * In-memory async mutex keyed by fingerprint.
 *
 * Serializes concurrent builds of the same layer inside one process so the
 * work is done once. Layer commits are idempotent, so this only avoids
 * duplicate work; it is not needed for correctness.
 */
export class FingerprintLock {
  private readonly tails = new Map<string, Promise<void>>()

  /** Number of fingerprints currently held or awaited. */
  get size(): number {
    return this.tails.size
  }

  /**
   * Runs `fn` once every earlier holder of `fingerprint` has finished.
   * The lock is released whether `fn` resolves or throws.
   */
  async run<T>(fingerprint: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(fingerprint) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(async () => current)
    this.tails.set(fingerprint, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(fingerprint) === tail) {
        this.tails.delete(fingerprint)
      }
    }
  }
}
