import {rm} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import * as tar from 'tar'
import {createTmpDir, writeTree} from '../../__tests__/helpers.js'
import {sha256} from '../../core/fingerprint.js'
import {rootConfig} from '../../core/snapshot-config.js'
import {ImageNotFoundError, LayerNotFoundError} from '../../errors.js'
import {exportImage} from '../image-export.js'
import {LayerStore} from '../layer-store.js'

async function storeWithImage() {
  const root = await createTmpDir()
  const store = await LayerStore.open(join(root, 'store'))
  const fingerprint = sha256('layer')
  const staged = await store.stage(fingerprint)
  await writeTree(staged.rootfsPath, {'app/app.py': 'print(1)', 'etc/motd': 'hi'})
  await store.put(fingerprint, {fingerprint, rootfs: fingerprint, config: rootConfig}, staged)
  await store.saveImage({
    schemaVersion: 1,
    digest: sha256('image'),
    name: 'web',
    stage: 'app',
    snapshot: fingerprint,
    rootfs: fingerprint,
    layers: [fingerprint],
    exposedPorts: [],
    env: {},
    workdir: '/app',
    entrypoint: ['python', 'app.py']
  })
  return {root, store}
}

async function listEntries(file: string): Promise<string[]> {
  const entries: string[] = []
  await tar.list({
    file,
    onReadEntry(entry) {
      entries.push(entry.path)
    }
  })
  return entries.sort()
}

test('archives the image rootfs', async t => {
  const {root, store} = await storeWithImage()
  const file = join(root, 'out', 'web.tar.gz')

  t.deepEqual(await exportImage(store, 'web', file), ['app', 'etc'])
  t.deepEqual(await listEntries(file), ['app/', 'app/app.py', 'etc/', 'etc/motd'])
})

test('unknown images are not exported', async t => {
  const {root, store} = await storeWithImage()
  await t.throwsAsync(exportImage(store, 'ghost', join(root, 'ghost.tar.gz')), {instanceOf: ImageNotFoundError})
})

test('an image whose layers were removed is not exported', async t => {
  const {root, store} = await storeWithImage()
  const image = await store.loadImage('web')
  await rm(store.layerPath(image.rootfs), {recursive: true})

  await t.throwsAsync(exportImage(store, 'web', join(root, 'web.tar.gz')), {
    instanceOf: LayerNotFoundError,
    message: `Layer not found: ${image.rootfs}`
  })
})

test('an empty rootfs still produces an archive', async t => {
  const root = await createTmpDir()
  const store = await LayerStore.open(join(root, 'store'))
  const fingerprint = sha256('empty')
  await store.put(fingerprint, {fingerprint, rootfs: fingerprint, config: rootConfig}, await store.stage(fingerprint))
  await store.saveImage({
    schemaVersion: 1,
    digest: sha256('empty-image'),
    name: 'empty',
    stage: 'app',
    snapshot: fingerprint,
    rootfs: fingerprint,
    layers: [fingerprint],
    exposedPorts: [],
    env: {},
    workdir: '/',
    entrypoint: ['true']
  })
  const file = join(root, 'empty.tar.gz')

  t.deepEqual(await exportImage(store, 'empty', file), [])
  t.is((await listEntries(file)).length, 1)
})
