import {CyclicDependencyError, UnknownBaseError, ValidationError} from '../errors.js'
import type {Stage} from '../types.js'

export type ResolvedBase =
  | {type: 'stage'; name: string}
  | {type: 'external'; ref: string}

export type PlannedStage = {
  stage: Stage;
  base: ResolvedBase;
  /** Stages that must be built first: the base stage plus every `copy --from` source. */
  dependencies: Set<string>;
}

/** Stages in build order: every stage appears after everything it depends on. */
export type BuildPlan = PlannedStage[]

export type PlanOptions = {
  /** Whether a base that names no declared stage is an acceptable external base. */
  isExternalBase(ref: string): boolean;
}

/**
 * Resolves stage bases and orders stages topologically.
 *
 * Ties between independent stages are broken by declaration order, so two
 * plans of the same recipe are always identical.
 */
export function planStages(stages: readonly Stage[], options: PlanOptions): BuildPlan {
  const declared = new Map<string, Stage>()
  for (const stage of stages) {
    if (declared.has(stage.name)) {
      throw new ValidationError(`Duplicate stage name: '${stage.name}'`)
    }

    declared.set(stage.name, stage)
  }

  const planned = stages.map(stage => resolveStage(stage, declared, options))
  return orderStages(planned)
}

function resolveStage(stage: Stage, declared: Map<string, Stage>, options: PlanOptions): PlannedStage {
  const dependencies = new Set<string>()
  let base: ResolvedBase
  if (declared.has(stage.from)) {
    base = {type: 'stage', name: stage.from}
    dependencies.add(stage.from)
  } else if (options.isExternalBase(stage.from)) {
    base = {type: 'external', ref: stage.from}
  } else {
    throw new UnknownBaseError(stage.name, stage.from)
  }

  for (const instruction of stage.instructions) {
    if (instruction.kind === 'copy' && instruction.from !== undefined) {
      if (!declared.has(instruction.from)) {
        throw new UnknownBaseError(stage.name, instruction.from)
      }

      dependencies.add(instruction.from)
    }
  }

  return {stage, base, dependencies}
}

/** Stable Kahn sort: always emit the earliest-declared stage whose dependencies are done. */
function orderStages(planned: PlannedStage[]): BuildPlan {
  const remaining = [...planned]
  const done = new Set<string>()
  const order: BuildPlan = []

  while (remaining.length > 0) {
    const index = remaining.findIndex(p => [...p.dependencies].every(dep => done.has(dep)))
    if (index === -1) {
      throw new CyclicDependencyError(remaining.map(p => p.stage.name))
    }

    const [next] = remaining.splice(index, 1)
    done.add(next.stage.name)
    order.push(next)
  }

  return order
}

function findStage(plan: BuildPlan, name: string): PlannedStage {
  const found = plan.find(p => p.stage.name === name)
  if (!found) {
    throw new ValidationError(`Unknown target stage: '${name}'`)
  }

  return found
}

/**
 * Chain of stages from the root (external base) to `target`, following base
 * references only. Copy sources are not part of the ancestry.
 */
export function ancestry(plan: BuildPlan, target: string): PlannedStage[] {
  const chain: PlannedStage[] = []
  let current: PlannedStage | undefined = findStage(plan, target)
  while (current) {
    chain.unshift(current)
    current = current.base.type === 'stage' ? findStage(plan, current.base.name) : undefined
  }

  return chain
}

/** Stages needed to build `target` (bases and copy sources, transitively), in plan order. */
export function requiredStages(plan: BuildPlan, target: string): BuildPlan {
  const needed = new Set<string>()
  const queue = [target]

  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined || needed.has(current)) {
      continue
    }

    needed.add(current)
    for (const dep of findStage(plan, current).dependencies) {
      if (!needed.has(dep)) {
        queue.push(dep)
      }
    }
  }

  return plan.filter(p => needed.has(p.stage.name))
}

/** The default build target: the last declared stage. */
export function defaultTarget(stages: readonly Stage[]): string {
  const last = stages.at(-1)
  if (!last) {
    throw new ValidationError('Recipe declares no stages')
  }

  return last.name
}
