import {copyFile, mkdir, readFile, readdir, stat} from 'node:fs/promises'
import {createHash} from 'node:crypto'
import type {Stats} from 'node:fs'
import {basename, dirname, isAbsolute, join, relative, resolve, sep} from 'node:path'
import ignore from 'ignore'
import {ValidationError} from '../errors.js'
import {compareCodeUnits, filesDigest} from '../core/fingerprint.js'
import {resolveWithin} from '../core/utils.js'

const ignoreFilenames = ['.stratumignore', '.dockerignore']

/** A file selected by a copy source. */
export type ContextFile = {
  /** Absolute host path. */
  path: string;
  /** Path relative to the copy source (`''` when the source is the file itself). */
  relativePath: string;
}

/** Files resolved for one copy source. */
export type ResolvedSource = {
  source: string;
  isDirectory: boolean;
  files: ContextFile[];
}

/**
 * Directory that `copy` instructions read from.
 *
 * Honours `.stratumignore` (or `.dockerignore` when absent), gitignore syntax.
 * Sources must resolve inside the context root.
 */
export class BuildContext {
  /**
   * Opens a build context and loads its ignore file.
   * @param root - Context directory
   * @param options.exclude - Host paths never selected, such as a layer store kept inside the context
   */
  static async open(root: string, options: {exclude?: readonly string[]} = {}): Promise<BuildContext> {
    const absoluteRoot = resolve(root)
    const excluded = (options.exclude ?? [])
      .map(path => toPosix(relative(absoluteRoot, resolve(path))))
      .filter(rel => rel !== '' && rel !== '..' && !rel.startsWith('../') && !isAbsolute(rel))
    const ig = ignore()
    for (const filename of ignoreFilenames) {
      try {
        ig.add(await readFile(join(absoluteRoot, filename), 'utf8'))
        ig.add(filename)
        break
      } catch {
        // No ignore file under this name
      }
    }

    return new BuildContext(absoluteRoot, path => path !== ''
      && (excluded.some(rel => path === rel || path.startsWith(rel + '/')) || ig.ignores(path) || ig.ignores(path + '/')))
  }

  private constructor(
    readonly root: string,
    private readonly isIgnored: (path: string) => boolean
  ) {}

  /**
   * Expands copy sources into the files they select.
   * @throws ValidationError if a source escapes the context or does not exist
   */
  async resolveSources(sources: readonly string[]): Promise<ResolvedSource[]> {
    return Promise.all(sources.map(async source => {
      const path = resolveWithin(this.root, source)
      if (!path) {
        throw new ValidationError(`Copy source "${source}" is outside the build context`)
      }

      return resolveSource(path, source, rel => this.isIgnored(toPosix(relative(this.root, join(path, rel)))))
    }))
  }

  /**
   * Digest over the content of every selected file, used as fingerprint input.
   */
  async digest(sources: readonly string[]): Promise<string> {
    const resolved = await this.resolveSources(sources)
    return digestSources(this.root, resolved)
  }
}

/**
 * Lists the files a source selects. A directory source selects its contents,
 * recursively, minus ignored entries.
 */
export async function resolveSource(path: string, source: string, isIgnored: (relativePath: string) => boolean = () => false): Promise<ResolvedSource> {
  let stats: Stats
  try {
    stats = await stat(path)
  } catch (error) {
    throw new ValidationError(`Copy source "${source}" not found`, {cause: error})
  }

  if (!stats.isDirectory()) {
    return {source, isDirectory: false, files: [{path, relativePath: ''}]}
  }

  const files: ContextFile[] = []
  await walk(path, '', isIgnored, files)
  files.sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath))
  return {source, isDirectory: true, files}
}

async function walk(root: string, rel: string, isIgnored: (relativePath: string) => boolean, files: ContextFile[]): Promise<void> {
  const entries = await readdir(join(root, rel), {withFileTypes: true})
  for (const entry of entries) {
    const entryRel = rel === '' ? entry.name : join(rel, entry.name)
    if (isIgnored(entryRel)) {
      continue
    }

    if (entry.isDirectory()) {
      await walk(root, entryRel, isIgnored, files)
    } else if (entry.isFile()) {
      files.push({path: join(root, entryRel), relativePath: entryRel})
    }
  }
}

export async function digestSources(root: string, sources: ResolvedSource[]): Promise<string> {
  const entries: Array<{path: string; hash: string}> = []
  for (const source of sources) {
    for (const file of source.files) {
      const content = await readFile(file.path)
      entries.push({
        path: `${source.source}:${toPosix(relative(root, file.path))}`,
        hash: createHash('sha256').update(content).digest('hex')
      })
    }
  }

  return filesDigest(entries)
}

/**
 * Copies resolved sources to `destination` (an absolute host path).
 *
 * Destination is a directory when it ends with `/` or `.`, when there are
 * several sources, when a source is a directory, or when it already exists as
 * a directory. Otherwise a single file source is copied to that exact path.
 */
export async function copySources(sources: ResolvedSource[], destination: string, declaredDestination: string): Promise<void> {
  const destIsDir = declaredDestination.endsWith('/')
    || declaredDestination === '.'
    || declaredDestination.endsWith('/.')
    || sources.length > 1
    || sources.some(s => s.isDirectory)
    || await isDirectory(destination)

  for (const source of sources) {
    for (const file of source.files) {
      let target: string
      if (source.isDirectory) {
        target = join(destination, file.relativePath)
      } else {
        target = destIsDir ? join(destination, basename(file.path)) : destination
      }

      await mkdir(dirname(target), {recursive: true})
      await copyFile(file.path, target)
    }
  }

  if (destIsDir) {
    await mkdir(destination, {recursive: true})
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/')
}
