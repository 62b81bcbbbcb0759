import type {Instruction} from './types.js'

export class StratumError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'StratumError'
  }
}

// -- Recipe errors -----------------------------------------------------------

export class RecipeError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RecipeError'
  }
}

export class ValidationError extends RecipeError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

// -- Planning errors ---------------------------------------------------------

export class PlanningError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'PlanningError'
  }
}

export class CyclicDependencyError extends PlanningError {
  constructor(readonly stages: string[], options?: {cause?: unknown}) {
    super('CYCLIC_DEPENDENCY', `Stage graph contains a cycle between: ${stages.join(', ')}`, options)
    this.name = 'CyclicDependencyError'
  }
}

export class UnknownBaseError extends PlanningError {
  constructor(
    readonly stage: string,
    readonly base: string,
    options?: {cause?: unknown}
  ) {
    super('UNKNOWN_BASE', `Stage '${stage}' references unknown base '${base}'`, options)
    this.name = 'UnknownBaseError'
  }
}

// -- Execution errors --------------------------------------------------------

export class ExecutionError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ExecutionError'
  }
}

export class InstructionFailedError extends ExecutionError {
  constructor(
    readonly stage: string,
    readonly index: number,
    readonly instruction: Instruction,
    readonly exitCode: number,
    readonly fingerprint: string,
    options?: {cause?: unknown}
  ) {
    super('INSTRUCTION_FAILED', `Stage ${stage}: instruction #${index} (${instruction.kind}) failed with exit code ${exitCode} [${fingerprint.slice(0, 12)}]`, options)
    this.name = 'InstructionFailedError'
  }
}

export class BuildAbortedError extends ExecutionError {
  constructor(
    readonly stage: string,
    readonly index: number,
    options?: {cause?: unknown}
  ) {
    super('BUILD_ABORTED', `Build aborted in stage ${stage} at instruction #${index}`, options)
    this.name = 'BuildAbortedError'
  }
}

// -- Assembly errors ---------------------------------------------------------

export class AssemblyError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'AssemblyError'
  }
}

export class NoEntrypointError extends AssemblyError {
  constructor(readonly stage: string, options?: {cause?: unknown}) {
    super('NO_ENTRYPOINT', `Stage ${stage}: no entrypoint declared in its ancestry`, options)
    this.name = 'NoEntrypointError'
  }
}

export class InvalidHealthcheckError extends AssemblyError {
  constructor(readonly stage: string, reason: string, options?: {cause?: unknown}) {
    super('INVALID_HEALTHCHECK', `Stage ${stage}: invalid healthcheck, ${reason}`, options)
    this.name = 'InvalidHealthcheckError'
  }
}

// -- Runtime errors ----------------------------------------------------------

export class RuntimeError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RuntimeError'
  }
}

export class ProcessExitedError extends RuntimeError {
  constructor(
    readonly exitCode: number | null,
    readonly signal?: string,
    options?: {cause?: unknown}
  ) {
    super('PROCESS_EXITED', signal ? `Managed process killed by ${signal}` : `Managed process exited with code ${exitCode ?? 'unknown'}`, options)
    this.name = 'ProcessExitedError'
  }
}

export class StartPeriodExceededError extends RuntimeError {
  constructor(readonly startPeriodMs: number, options?: {cause?: unknown}) {
    super('START_PERIOD_EXCEEDED', `No successful healthcheck within start period of ${startPeriodMs}ms`, options)
    this.name = 'StartPeriodExceededError'
  }
}

// -- Store errors ------------------------------------------------------------

export class StoreError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'StoreError'
  }
}

export class LayerNotFoundError extends StoreError {
  constructor(readonly fingerprint: string, options?: {cause?: unknown}) {
    super('LAYER_NOT_FOUND', `Layer not found: ${fingerprint}`, options)
    this.name = 'LayerNotFoundError'
  }
}

export class ImageNotFoundError extends StoreError {
  constructor(readonly tag: string, options?: {cause?: unknown}) {
    super('IMAGE_NOT_FOUND', `Image not found: ${tag}`, options)
    this.name = 'ImageNotFoundError'
  }
}

export class InvalidReferenceError extends StoreError {
  constructor(kind: string, value: string, options?: {cause?: unknown}) {
    super('INVALID_REFERENCE', `Invalid ${kind}: ${value}. Must contain only alphanumeric characters, dots, dashes, and underscores.`, options)
    this.name = 'InvalidReferenceError'
  }
}
