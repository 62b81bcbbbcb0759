import {mkdir} from 'node:fs/promises'
import {BuildAbortedError, InstructionFailedError, StratumError} from '../errors.js'
import {copySources, resolveSource, type BuildContext, type ResolvedSource} from '../engine/build-context.js'
import type {CommandRunner} from '../engine/command-runner.js'
import type {LayerStore, StagedLayer} from '../engine/layer-store.js'
import type {CopyInstruction, Instruction, LayerRecord, RunInstruction, Snapshot, Stage} from '../types.js'
import {sha256, stepFingerprint} from './fingerprint.js'
import {describeInstruction} from './instructions.js'
import {type Reporter, type StepRef, stepLabel} from './reporter.js'
import {applyInstruction, resolveContainerPath} from './snapshot-config.js'
import {resolveWithin} from './utils.js'

export type StageExecutionOptions = {
  /** Final snapshots of already-built stages, for `copy --from`. */
  stageSnapshots: ReadonlyMap<string, Snapshot>;
  /** Execute every step even when a cached layer exists. */
  noCache?: boolean;
  /** Cancels the build; checked before each step and forwarded to the runner. */
  signal?: AbortSignal;
  /** Per-step timeout for `run` instructions. */
  stepTimeoutMs?: number;
}

export type StageResult = {
  snapshot: Snapshot;
  layers: LayerRecord[];
  executed: number;
  cached: number;
}

type StepContext = {
  stage: Stage;
  index: number;
  instruction: Instruction;
  parent: Snapshot;
  fingerprint: string;
  stepRef: StepRef;
  options: StageExecutionOptions;
}

/**
 * Applies a stage's instructions in order on top of a base snapshot,
 * consulting the layer store before each step.
 */
export class StageExecutor {
  constructor(
    private readonly store: LayerStore,
    private readonly context: BuildContext,
    private readonly runner: CommandRunner,
    private readonly reporter: Reporter
  ) {}

  async execute(stage: Stage, base: Snapshot, options: StageExecutionOptions): Promise<StageResult> {
    let current = base
    const layers: LayerRecord[] = []
    let executed = 0
    let cached = 0

    for (const [index, instruction] of stage.instructions.entries()) {
      if (options.signal?.aborted) {
        throw new BuildAbortedError(stage.name, index, {cause: options.signal.reason})
      }

      const stepRef: StepRef = {stage: stage.name, index, kind: instruction.kind, summary: describeInstruction(instruction)}
      const inputDigest = await this.inputDigest(stage, index, instruction, current, options)
      const fingerprint = stepFingerprint({parent: current.fingerprint, instruction, inputDigest})

      if (!options.noCache) {
        const hit = await this.store.get(fingerprint)
        if (hit) {
          this.reporter.emit({event: 'STEP_CACHED', step: stepRef, fingerprint})
          layers.push({stage: stage.name, index, fingerprint, cached: true, instruction})
          cached++
          current = hit
          continue
        }
      }

      const ctx: StepContext = {stage, index, instruction, parent: current, fingerprint, stepRef, options}
      const result = await this.store.withLock(fingerprint, async () => {
        // Another build may have committed it while we waited for the lock
        const hit = options.noCache ? undefined : await this.store.get(fingerprint)
        return hit ? {snapshot: hit, cached: true} : {snapshot: await this.executeStep(ctx), cached: false}
      })

      if (result.cached) {
        this.reporter.emit({event: 'STEP_CACHED', step: stepRef, fingerprint})
        cached++
      } else {
        executed++
      }

      layers.push({stage: stage.name, index, fingerprint, cached: result.cached, instruction})
      current = result.snapshot
    }

    return {snapshot: current, layers, executed, cached}
  }

  private async inputDigest(stage: Stage, index: number, instruction: Instruction, parent: Snapshot, options: StageExecutionOptions): Promise<string | undefined> {
    if (instruction.kind !== 'copy') {
      return undefined
    }

    if (instruction.from !== undefined) {
      return sha256('stage', this.sourceStage(stage, index, instruction, parent, options).fingerprint)
    }

    try {
      return await this.context.digest(instruction.sources)
    } catch (error) {
      throw this.copyFailed(stage, index, instruction, parent, error)
    }
  }

  private sourceStage(stage: Stage, index: number, instruction: CopyInstruction, parent: Snapshot, options: StageExecutionOptions): Snapshot {
    const source = instruction.from === undefined ? undefined : options.stageSnapshots.get(instruction.from)
    if (!source) {
      throw this.copyFailed(stage, index, instruction, parent, new StratumError('STAGE_NOT_BUILT', `Stage ${instruction.from ?? '?'} has not been built`))
    }

    return source
  }

  private copyFailed(stage: Stage, index: number, instruction: Instruction, parent: Snapshot, cause: unknown, fingerprint?: string): InstructionFailedError {
    return new InstructionFailedError(stage.name, index, instruction, 1, fingerprint ?? stepFingerprint({parent: parent.fingerprint, instruction}), {cause})
  }

  private async executeStep(ctx: StepContext): Promise<Snapshot> {
    const {instruction, parent, fingerprint, stepRef} = ctx
    const config = applyInstruction(parent.config, instruction)
    const startedAt = Date.now()
    this.reporter.emit({event: 'STEP_STARTING', step: stepRef, fingerprint})

    let snapshot: Snapshot
    if (instruction.kind === 'run' || instruction.kind === 'copy') {
      const staged = await this.store.stage(fingerprint, this.store.rootfsPath(parent))
      try {
        await (instruction.kind === 'run' ? this.applyRun(ctx, instruction, staged) : this.applyCopy(ctx, instruction, staged))
      } catch (error) {
        await this.store.discard(staged)
        throw error
      }

      snapshot = await this.store.put(fingerprint, {fingerprint, parent: parent.fingerprint, rootfs: fingerprint, config, instruction}, staged)
    } else {
      snapshot = await this.store.put(fingerprint, {fingerprint, parent: parent.fingerprint, rootfs: parent.rootfs, config, instruction})
    }

    this.reporter.emit({event: 'STEP_FINISHED', step: stepRef, fingerprint, durationMs: Date.now() - startedAt})
    return snapshot
  }

  private async applyRun(ctx: StepContext, instruction: RunInstruction, staged: StagedLayer): Promise<void> {
    const {stage, index, parent, fingerprint, stepRef, options} = ctx
    const cwd = resolveWithin(staged.rootfsPath, parent.config.workdir) ?? staged.rootfsPath
    await mkdir(cwd, {recursive: true})

    const label = stepLabel(stepRef)
    const result = await this.runner.run({
      command: instruction.command,
      rootfs: staged.rootfsPath,
      cwd,
      env: parent.config.env,
      timeoutMs: options.stepTimeoutMs,
      signal: options.signal
    }, ({stream, line}) => {
      this.reporter.log(label, stream, line)
    })

    if (result.aborted || options.signal?.aborted) {
      throw new BuildAbortedError(stage.name, index, {cause: options.signal?.reason})
    }

    if (result.exitCode !== 0) {
      this.reporter.emit({event: 'STEP_FAILED', step: stepRef, fingerprint, exitCode: result.exitCode})
      throw new InstructionFailedError(stage.name, index, instruction, result.exitCode, fingerprint, {cause: result.error})
    }
  }

  private async applyCopy(ctx: StepContext, instruction: CopyInstruction, staged: StagedLayer): Promise<void> {
    const {stage, index, parent, fingerprint, stepRef} = ctx
    try {
      const sources = await this.resolveCopySources(ctx, instruction)
      const containerPath = resolveContainerPath(parent.config.workdir, instruction.destination)
      const destination = resolveWithin(staged.rootfsPath, containerPath) ?? staged.rootfsPath
      await copySources(sources, destination, instruction.destination)
    } catch (error) {
      this.reporter.emit({event: 'STEP_FAILED', step: stepRef, fingerprint, exitCode: 1})
      throw this.copyFailed(stage, index, instruction, parent, error, fingerprint)
    }
  }

  private async resolveCopySources(ctx: StepContext, instruction: CopyInstruction): Promise<ResolvedSource[]> {
    if (instruction.from === undefined) {
      return this.context.resolveSources(instruction.sources)
    }

    const source = this.sourceStage(ctx.stage, ctx.index, instruction, ctx.parent, ctx.options)
    const root = this.store.rootfsPath(source)
    return Promise.all(instruction.sources.map(async path => {
      const resolved = resolveWithin(root, path)
      if (!resolved) {
        throw new StratumError('PATH_ESCAPE', `Copy source "${path}" escapes stage ${instruction.from ?? '?'}`)
      }

      return resolveSource(resolved, path)
    }))
  }
}
