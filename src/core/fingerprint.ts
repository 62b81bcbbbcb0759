import {createHash} from 'node:crypto'
import type {Instruction} from '../types.js'

/**
 * Serializes a JSON-compatible value with object keys sorted at every level
 * and `undefined` properties dropped, so equal values always hash equally.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => sortKeys(item))
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key)
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry)
      }
    }

    return sorted
  }

  return value
}

export function sha256(...parts: string[]): string {
  const hash = createHash('sha256')
  for (const part of parts) {
    hash.update(part)
    hash.update('\0')
  }

  return hash.digest('hex')
}

/**
 * Fingerprint of an external base. The resolver digest changes when the
 * content a base identity maps to changes (e.g. a different local directory).
 */
export function baseFingerprint(ref: string, resolverDigest: string): string {
  return sha256('base', ref, resolverDigest)
}

/**
 * Fingerprint of one build step.
 *
 * ```
 * SHA256(parent fingerprint, canonical JSON(instruction), input digest)
 * ```
 *
 * Because the parent fingerprint is chained in, changing a step invalidates
 * every later step of its stage and every stage derived from it.
 */
export function stepFingerprint(config: {
  parent: string;
  instruction: Instruction;
  inputDigest?: string;
}): string {
  return sha256('step', config.parent, canonicalJson(config.instruction), config.inputDigest ?? '')
}

/**
 * Digest of a set of files: each entry contributes its relative path and
 * content hash, in sorted path order.
 */
export function filesDigest(files: Array<{path: string; hash: string}>): string {
  const sorted = [...files].sort((a, b) => compareCodeUnits(a.path, b.path))
  return sha256('files', ...sorted.flatMap(f => [f.path, f.hash]))
}

/** Locale-independent string order. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1
  }

  return a > b ? 1 : 0
}
