import test from 'ava'
import {baseFingerprint, canonicalJson, compareCodeUnits, filesDigest, sha256, stepFingerprint} from '../fingerprint.js'

// -- canonicalJson -----------------------------------------------------------

test('canonicalJson sorts keys at every level and drops undefined', t => {
  const value = {b: 1, a: {d: undefined, c: [{z: 1, y: 2}]}}
  t.is(canonicalJson(value), '{"a":{"c":[{"y":2,"z":1}]},"b":1}')
})

test('canonicalJson keeps array order', t => {
  t.is(canonicalJson([3, 1, 2]), '[3,1,2]')
})

// -- sha256 ------------------------------------------------------------------

test('sha256 returns 64 hex characters', t => {
  t.regex(sha256('a'), /^[a-f\d]{64}$/)
})

test('sha256 separates parts', t => {
  t.not(sha256('ab', 'c'), sha256('a', 'bc'))
})

// -- stepFingerprint ---------------------------------------------------------

const parent = sha256('parent')

test('stepFingerprint is stable for equal inputs', t => {
  const a = stepFingerprint({parent, instruction: {kind: 'env', name: 'A', value: '1'}})
  const b = stepFingerprint({parent, instruction: {kind: 'env', name: 'A', value: '1'}})
  t.is(a, b)
})

test('stepFingerprint ignores property order', t => {
  const a = stepFingerprint({parent, instruction: {kind: 'copy', sources: ['a'], destination: '/app'}})
  const b = stepFingerprint({parent, instruction: {destination: '/app', sources: ['a'], kind: 'copy'}})
  t.is(a, b)
})

test('stepFingerprint changes with parent, instruction or input digest', t => {
  const instruction = {kind: 'run', command: ['/bin/sh', '-c', 'make']} as const
  const reference = stepFingerprint({parent, instruction})
  t.not(stepFingerprint({parent: sha256('other'), instruction}), reference)
  t.not(stepFingerprint({parent, instruction: {kind: 'run', command: ['/bin/sh', '-c', 'make all']}}), reference)
  t.not(stepFingerprint({parent, instruction, inputDigest: sha256('files')}), reference)
})

test('baseFingerprint depends on the resolver digest', t => {
  t.not(baseFingerprint('python:3.11-slim', 'scratch'), baseFingerprint('python:3.11-slim', sha256('dir')))
  t.is(baseFingerprint('python:3.11-slim', 'scratch'), baseFingerprint('python:3.11-slim', 'scratch'))
})

// -- filesDigest -------------------------------------------------------------

test('filesDigest ignores input order', t => {
  const a = filesDigest([{path: 'a', hash: '1'}, {path: 'b', hash: '2'}])
  const b = filesDigest([{path: 'b', hash: '2'}, {path: 'a', hash: '1'}])
  t.is(a, b)
})

test('filesDigest orders paths by code unit', t => {
  const expected = sha256('files', 'B', '1', 'a', '2')
  t.is(filesDigest([{path: 'a', hash: '2'}, {path: 'B', hash: '1'}]), expected)
  t.deepEqual(['b', 'a', 'B', '_'].sort(compareCodeUnits), ['B', '_', 'a', 'b'])
})

test('filesDigest changes with content', t => {
  const a = filesDigest([{path: 'a', hash: '1'}])
  const b = filesDigest([{path: 'a', hash: '2'}])
  t.not(a, b)
})
