import {readdir, stat} from 'node:fs/promises'
import {isAbsolute, join, relative, resolve, sep} from 'node:path'
import {deburr} from 'lodash-es'
import {ValidationError} from '../errors.js'

export async function dirSize(dirPath: string): Promise<number> {
  let total = 0
  try {
    const entries = await readdir(dirPath, {withFileTypes: true})
    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name)
      if (entry.isDirectory()) {
        total += await dirSize(fullPath)
      } else if (entry.isFile()) {
        const s = await stat(fullPath)
        total += s.size
      }
    }
  } catch {
    // Directory doesn't exist or isn't readable
  }

  return total
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

const durationUnits: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
}

/**
 * Parses a duration such as `500ms`, `30s`, `1m30s` or `1h` into milliseconds.
 * A bare number is taken as milliseconds. Negative values are allowed through
 * so that the assembler can report them with stage context.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Invalid duration: ${value}`)
    }

    return value
  }

  const trimmed = value.trim()
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed)
  }

  const negative = trimmed.startsWith('-')
  const body = negative ? trimmed.slice(1) : trimmed
  const pattern = /(\d+(?:\.\d+)?)(ms|h|m|s)/g
  let total = 0
  let consumed = 0
  for (const match of body.matchAll(pattern)) {
    if (match.index !== consumed) {
      break
    }

    total += Number(match[1]) * durationUnits[match[2]]
    consumed += match[0].length
  }

  if (body.length === 0 || consumed !== body.length) {
    throw new ValidationError(`Invalid duration: "${value}" (expected e.g. 500ms, 30s, 1m30s)`)
  }

  return negative ? -total : total
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w.-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

/**
 * Resolves `path` against `root` and ensures the result stays inside `root`.
 * Absolute paths are interpreted relative to `root` (chroot-style).
 * @returns Absolute host path, or undefined if it escapes `root`
 */
export function resolveWithin(root: string, path: string): string | undefined {
  const base = resolve(root)
  const target = isAbsolute(path) ? resolve(base, `.${sep}${path}`) : resolve(base, path)
  const rel = relative(base, target)
  if (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)) {
    return target
  }

  return undefined
}
