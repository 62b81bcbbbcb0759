import test from 'ava'
import {ValidationError} from '../../errors.js'
import {collect, parseEnvPairs} from '../utils.js'

test('parseEnvPairs splits on the first =', t => {
  t.deepEqual(parseEnvPairs(['PORT=9000', 'QUERY=a=b', 'EMPTY=']), {PORT: '9000', QUERY: 'a=b', EMPTY: ''})
})

test('parseEnvPairs keeps the last value of a repeated name', t => {
  t.deepEqual(parseEnvPairs(['A=1', 'A=2']), {A: '2'})
})

test('parseEnvPairs rejects pairs without =', t => {
  t.throws(() => parseEnvPairs(['PORT']), {instanceOf: ValidationError, message: 'Invalid environment variable "PORT" (expected KEY=VALUE)'})
})

test('parseEnvPairs rejects invalid names', t => {
  t.throws(() => parseEnvPairs(['1X=a']), {instanceOf: ValidationError, message: 'Invalid environment variable "1X=a" (expected KEY=VALUE)'})
})

test('collect accumulates repeated options', t => {
  t.deepEqual(collect('b', collect('a')), ['a', 'b'])
})
