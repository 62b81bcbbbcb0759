import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import {createTmpDir, writeTree} from '../../__tests__/helpers.js'
import {isEnvName, loadEnvFile} from '../env-file.js'

test('isEnvName accepts shell identifiers only', t => {
  t.true(isEnvName('PORT'))
  t.true(isEnvName('_private_1'))
  t.false(isEnvName('1BAD'))
  t.false(isEnvName('with-dash'))
  t.false(isEnvName(''))
})

test('loadEnvFile parses values, quotes and comments', async t => {
  const dir = await createTmpDir()
  await writeTree(dir, {'.env': '# overrides\nPORT=9000\nGREETING="hello world"\nEMPTY=\n'})
  t.deepEqual(await loadEnvFile(join(dir, '.env')), {PORT: '9000', GREETING: 'hello world', EMPTY: ''})
})

test('loadEnvFile rejects a missing file', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'missing.env')
  await t.throwsAsync(loadEnvFile(file), {instanceOf: ValidationError, message: `Cannot read env file ${file}`})
})

test('loadEnvFile rejects invalid names', async t => {
  const dir = await createTmpDir()
  const file = join(dir, '.env')
  await writeTree(dir, {'.env': 'OK=1\n1BAD=2\n'})
  await t.throwsAsync(loadEnvFile(file), {instanceOf: ValidationError, message: `${file}: invalid environment variable name "1BAD"`})
})
