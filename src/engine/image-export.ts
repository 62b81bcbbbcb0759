import {mkdir, readdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import * as tar from 'tar'
import type {LayerStore} from './layer-store.js'

/**
 * Writes the root filesystem of a tagged image to a gzipped tarball.
 * Entries are relative to the rootfs root; owner and mtime data are
 * normalised so equal images give equal archives.
 * @returns Top-level entries archived
 */
export async function exportImage(store: LayerStore, tag: string, file: string): Promise<string[]> {
  const image = await store.loadImage(tag)
  const rootfs = await store.imageRootfs(image)
  const entries = (await readdir(rootfs)).sort()

  await mkdir(dirname(file), {recursive: true})
  await tar.create(
    {
      cwd: rootfs,
      file,
      gzip: true,
      portable: true,
      noMtime: true
    },
    entries.length > 0 ? entries : ['.']
  )

  return entries
}
