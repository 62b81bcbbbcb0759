import test from 'ava'
import {
  AssemblyError,
  BuildAbortedError,
  CyclicDependencyError,
  ExecutionError,
  ImageNotFoundError,
  InstructionFailedError,
  InvalidHealthcheckError,
  InvalidReferenceError,
  LayerNotFoundError,
  NoEntrypointError,
  PlanningError,
  ProcessExitedError,
  RecipeError,
  RuntimeError,
  StartPeriodExceededError,
  StoreError,
  StratumError,
  UnknownBaseError,
  ValidationError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('ValidationError is instanceof RecipeError and StratumError', t => {
  const error = new ValidationError('invalid')
  t.true(error instanceof ValidationError)
  t.true(error instanceof RecipeError)
  t.true(error instanceof StratumError)
  t.true(error instanceof Error)
})

test('CyclicDependencyError and UnknownBaseError are planning errors', t => {
  t.true(new CyclicDependencyError(['a', 'b']) instanceof PlanningError)
  t.true(new UnknownBaseError('app', 'missing') instanceof PlanningError)
  t.true(new UnknownBaseError('app', 'missing') instanceof StratumError)
})

test('InstructionFailedError and BuildAbortedError are execution errors', t => {
  const failed = new InstructionFailedError('build', 2, {kind: 'run', command: ['make']}, 2, 'f'.repeat(64))
  t.true(failed instanceof ExecutionError)
  t.true(new BuildAbortedError('build', 0) instanceof ExecutionError)
})

test('NoEntrypointError and InvalidHealthcheckError are assembly errors', t => {
  t.true(new NoEntrypointError('app') instanceof AssemblyError)
  t.true(new InvalidHealthcheckError('app', 'retries must be at least 1') instanceof AssemblyError)
})

test('ProcessExitedError and StartPeriodExceededError are runtime errors', t => {
  t.true(new ProcessExitedError(1) instanceof RuntimeError)
  t.true(new StartPeriodExceededError(30_000) instanceof RuntimeError)
})

test('store errors share StoreError', t => {
  t.true(new LayerNotFoundError('abc') instanceof StoreError)
  t.true(new ImageNotFoundError('app') instanceof StoreError)
  t.true(new InvalidReferenceError('tag', '../x') instanceof StoreError)
})

// -- code property -----------------------------------------------------------

test('each error carries its code', t => {
  t.is(new ValidationError('msg').code, 'VALIDATION_ERROR')
  t.is(new CyclicDependencyError(['a']).code, 'CYCLIC_DEPENDENCY')
  t.is(new UnknownBaseError('a', 'b').code, 'UNKNOWN_BASE')
  t.is(new InstructionFailedError('s', 0, {kind: 'workdir', path: '/'}, 1, 'abc').code, 'INSTRUCTION_FAILED')
  t.is(new BuildAbortedError('s', 0).code, 'BUILD_ABORTED')
  t.is(new NoEntrypointError('s').code, 'NO_ENTRYPOINT')
  t.is(new InvalidHealthcheckError('s', 'bad').code, 'INVALID_HEALTHCHECK')
  t.is(new ProcessExitedError(3).code, 'PROCESS_EXITED')
  t.is(new StartPeriodExceededError(1000).code, 'START_PERIOD_EXCEEDED')
  t.is(new LayerNotFoundError('abc').code, 'LAYER_NOT_FOUND')
  t.is(new ImageNotFoundError('app').code, 'IMAGE_NOT_FOUND')
  t.is(new InvalidReferenceError('tag', '../x').code, 'INVALID_REFERENCE')
})

test('errors carry no retry flag', t => {
  t.false('transient' in new ValidationError('msg'))
  t.false('transient' in new ProcessExitedError(1))
})

// -- cause chaining ----------------------------------------------------------

test('StratumError supports cause chaining', t => {
  const cause = new Error('original')
  const error = new ValidationError('wrapped', {cause})
  t.is(error.cause, cause)
})

test('InstructionFailedError keeps the runner error as cause', t => {
  const cause = new Error('spawn ENOENT')
  const error = new InstructionFailedError('build', 0, {kind: 'run', command: ['missing']}, 127, 'abc', {cause})
  t.is(error.cause, cause)
})

// -- message content ---------------------------------------------------------

test('CyclicDependencyError lists the stages involved', t => {
  const error = new CyclicDependencyError(['a', 'b'])
  t.is(error.message, 'Stage graph contains a cycle between: a, b')
  t.deepEqual(error.stages, ['a', 'b'])
})

test('UnknownBaseError names the stage and the base', t => {
  const error = new UnknownBaseError('app', 'builder')
  t.is(error.message, 'Stage \'app\' references unknown base \'builder\'')
  t.is(error.stage, 'app')
  t.is(error.base, 'builder')
})

test('InstructionFailedError reports stage, index, exit code and short fingerprint', t => {
  const fingerprint = '0123456789abcdef'.repeat(4)
  const error = new InstructionFailedError('build', 3, {kind: 'run', command: ['/bin/sh', '-c', 'make']}, 2, fingerprint)
  t.is(error.message, 'Stage build: instruction #3 (run) failed with exit code 2 [0123456789ab]')
  t.is(error.exitCode, 2)
  t.is(error.fingerprint, fingerprint)
})

test('ProcessExitedError describes code or signal', t => {
  t.is(new ProcessExitedError(3).message, 'Managed process exited with code 3')
  t.is(new ProcessExitedError(null, 'SIGKILL').message, 'Managed process killed by SIGKILL')
  t.is(new ProcessExitedError(null).message, 'Managed process exited with code unknown')
})

test('StartPeriodExceededError includes the start period', t => {
  const error = new StartPeriodExceededError(30_000)
  t.is(error.message, 'No successful healthcheck within start period of 30000ms')
  t.is(error.startPeriodMs, 30_000)
})
