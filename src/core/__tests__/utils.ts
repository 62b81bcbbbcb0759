import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import {createTmpDir, writeTree} from '../../__tests__/helpers.js'
import {dirSize, formatDuration, formatSize, parseDuration, resolveWithin, slugify} from '../utils.js'

// -- parseDuration -----------------------------------------------------------

test('parseDuration: single units', t => {
  t.is(parseDuration('500ms'), 500)
  t.is(parseDuration('30s'), 30_000)
  t.is(parseDuration('2m'), 120_000)
  t.is(parseDuration('1h'), 3_600_000)
})

test('parseDuration: compound values', t => {
  t.is(parseDuration('1m30s'), 90_000)
  t.is(parseDuration('1h0m5s'), 3_605_000)
})

test('parseDuration: bare numbers are milliseconds', t => {
  t.is(parseDuration('250'), 250)
  t.is(parseDuration(42), 42)
})

test('parseDuration: negative values pass through', t => {
  t.is(parseDuration('-5s'), -5000)
})

test('parseDuration: rejects garbage', t => {
  t.throws(() => parseDuration('5x'), {instanceOf: ValidationError})
  t.throws(() => parseDuration(''), {instanceOf: ValidationError})
  t.throws(() => parseDuration('s30'), {instanceOf: ValidationError})
  t.throws(() => parseDuration(Number.NaN), {instanceOf: ValidationError})
})

// -- slugify -----------------------------------------------------------------

test('slugify: lowercases and replaces spaces', t => {
  t.is(slugify('My App'), 'my-app')
})

test('slugify: strips accents', t => {
  t.is(slugify('Café Déjà'), 'cafe-deja')
})

test('slugify: collapses and trims dashes', t => {
  t.is(slugify('--weird  name--'), 'weird-name')
})

// -- resolveWithin -----------------------------------------------------------

test('resolveWithin: absolute paths are rooted', t => {
  t.is(resolveWithin('/srv/rootfs', '/etc/app'), '/srv/rootfs/etc/app')
  t.is(resolveWithin('/srv/rootfs', '/'), '/srv/rootfs')
})

test('resolveWithin: relative paths resolve under root', t => {
  t.is(resolveWithin('/srv/rootfs', 'a/b'), '/srv/rootfs/a/b')
})

test('resolveWithin: escapes return undefined', t => {
  t.is(resolveWithin('/srv/rootfs', '../etc'), undefined)
  t.is(resolveWithin('/srv/rootfs', '/../../etc'), undefined)
})

// -- formatting --------------------------------------------------------------

test('formatDuration', t => {
  t.is(formatDuration(500), '500ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(90_000), '1m 30s')
})

test('formatSize', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(2048), '2.0 KB')
  t.is(formatSize(3 * 1024 * 1024), '3.0 MB')
})

// -- dirSize -----------------------------------------------------------------

test('dirSize sums file sizes recursively', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'a.txt': 'abc', 'sub/b.txt': 'hello'})
  t.is(await dirSize(root), 8)
})

test('dirSize of a missing directory is 0', async t => {
  const root = await createTmpDir()
  t.is(await dirSize(join(root, 'missing')), 0)
})
