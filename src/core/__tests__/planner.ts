import test from 'ava'
import {CyclicDependencyError, UnknownBaseError, ValidationError} from '../../errors.js'
import type {Instruction, Stage} from '../../types.js'
import {ancestry, defaultTarget, planStages, requiredStages} from '../planner.js'

function makeStage(name: string, from: string, instructions: Instruction[] = []): Stage {
  return {name, from, instructions}
}

const external = {isExternalBase: (ref: string) => ref.includes(':') || ref === 'scratch'}

function names(plan: Array<{stage: Stage}>): string[] {
  return plan.map(p => p.stage.name)
}

// -- planStages --------------------------------------------------------------

test('planStages: linear chain', t => {
  const plan = planStages([
    makeStage('base', 'python:3.11-slim'),
    makeStage('deps', 'base'),
    makeStage('app', 'deps')
  ], external)
  t.deepEqual(names(plan), ['base', 'deps', 'app'])
  t.deepEqual(plan[0].base, {type: 'external', ref: 'python:3.11-slim'})
  t.deepEqual(plan[2].base, {type: 'stage', name: 'deps'})
})

test('planStages: stage declared before its base is moved after it', t => {
  const plan = planStages([
    makeStage('app', 'base'),
    makeStage('base', 'scratch')
  ], external)
  t.deepEqual(names(plan), ['base', 'app'])
})

test('planStages: independent stages keep declaration order', t => {
  const plan = planStages([
    makeStage('c', 'scratch'),
    makeStage('a', 'scratch'),
    makeStage('b', 'scratch')
  ], external)
  t.deepEqual(names(plan), ['c', 'a', 'b'])
})

test('planStages: copy --from adds a dependency', t => {
  const plan = planStages([
    makeStage('runtime', 'scratch', [{kind: 'copy', sources: ['/out'], destination: '/app', from: 'build'}]),
    makeStage('build', 'scratch')
  ], external)
  t.deepEqual(names(plan), ['build', 'runtime'])
  t.deepEqual([...plan[1].dependencies], ['build'])
})

test('planStages: same recipe gives the same plan', t => {
  const stages = [
    makeStage('a', 'scratch'),
    makeStage('b', 'a'),
    makeStage('c', 'scratch'),
    makeStage('d', 'b', [{kind: 'copy', sources: ['/x'], destination: '/', from: 'c'}])
  ]
  t.deepEqual(names(planStages(stages, external)), names(planStages(stages, external)))
  t.deepEqual(names(planStages(stages, external)), ['a', 'b', 'c', 'd'])
})

test('planStages: two-stage cycle', t => {
  const error = t.throws(() => planStages([makeStage('a', 'b'), makeStage('b', 'a')], external), {instanceOf: CyclicDependencyError})
  t.deepEqual(error?.stages, ['a', 'b'])
})

test('planStages: self reference is a cycle', t => {
  t.throws(() => planStages([makeStage('a', 'a')], external), {instanceOf: CyclicDependencyError})
})

test('planStages: cycle through copy --from', t => {
  t.throws(() => planStages([
    makeStage('a', 'scratch', [{kind: 'copy', sources: ['/x'], destination: '/', from: 'b'}]),
    makeStage('b', 'a')
  ], external), {instanceOf: CyclicDependencyError})
})

test('planStages: unknown base', t => {
  const error = t.throws(() => planStages([makeStage('app', 'builder')], external), {instanceOf: UnknownBaseError})
  t.is(error?.stage, 'app')
  t.is(error?.base, 'builder')
})

test('planStages: unknown copy source stage', t => {
  t.throws(() => planStages([
    makeStage('app', 'scratch', [{kind: 'copy', sources: ['/x'], destination: '/', from: 'ghost'}])
  ], external), {instanceOf: UnknownBaseError, message: /ghost/})
})

test('planStages: duplicate stage names', t => {
  t.throws(() => planStages([makeStage('a', 'scratch'), makeStage('a', 'scratch')], external), {
    instanceOf: ValidationError,
    message: 'Duplicate stage name: \'a\''
  })
})

test('planStages: a declared stage wins over an external base of the same name', t => {
  const plan = planStages([makeStage('scratch', 'python:3.11'), makeStage('app', 'scratch')], external)
  t.deepEqual(plan[1].base, {type: 'stage', name: 'scratch'})
})

// -- ancestry & requiredStages ----------------------------------------------

const multiStage = [
  makeStage('base', 'python:3.11-slim'),
  makeStage('build', 'base'),
  makeStage('tools', 'scratch'),
  makeStage('runtime', 'base', [{kind: 'copy', sources: ['/out'], destination: '/app', from: 'build'}]),
  makeStage('unused', 'scratch')
]

test('ancestry follows base references only', t => {
  const plan = planStages(multiStage, external)
  t.deepEqual(names(ancestry(plan, 'runtime')), ['base', 'runtime'])
  t.deepEqual(names(ancestry(plan, 'base')), ['base'])
})

test('requiredStages includes copy sources and skips unrelated stages', t => {
  const plan = planStages(multiStage, external)
  t.deepEqual(names(requiredStages(plan, 'runtime')), ['base', 'build', 'runtime'])
  t.deepEqual(names(requiredStages(plan, 'tools')), ['tools'])
})

test('requiredStages rejects an unknown target', t => {
  const plan = planStages(multiStage, external)
  t.throws(() => requiredStages(plan, 'ghost'), {instanceOf: ValidationError, message: 'Unknown target stage: \'ghost\''})
})

test('defaultTarget is the last declared stage', t => {
  t.is(defaultTarget(multiStage), 'unused')
  t.throws(() => defaultTarget([]), {instanceOf: ValidationError})
})
