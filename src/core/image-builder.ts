import {StratumError} from '../errors.js'
import type {BaseResolver} from '../engine/base-resolver.js'
import {BuildContext} from '../engine/build-context.js'
import type {CommandRunner} from '../engine/command-runner.js'
import type {LayerStore} from '../engine/layer-store.js'
import type {ImageDescriptor, LayerRecord, Recipe, Snapshot} from '../types.js'
import {assembleImage} from './assembler.js'
import {ancestry, defaultTarget, planStages, requiredStages, type PlannedStage} from './planner.js'
import type {Reporter} from './reporter.js'
import {StageExecutor} from './stage-executor.js'

export type BuildOptions = {
  /** Stage to build; defaults to the last declared stage. */
  target?: string;
  /** Image tag; defaults to the recipe name. */
  tag?: string;
  /** Directory `copy` sources are read from; defaults to the recipe directory. */
  contextDir?: string;
  noCache?: boolean;
  signal?: AbortSignal;
  stepTimeoutMs?: number;
}

export type BuildResult = {
  image: ImageDescriptor;
  /** Every step of every built stage, in execution order. */
  layers: LayerRecord[];
  executed: number;
  cached: number;
}

/**
 * Builds an image from a recipe.
 *
 * ## Workflow
 *
 * 1. **Planning**: resolves stage bases and orders the stages needed by the target
 * 2. **Execution**: builds each stage on its base snapshot; steps whose
 *    fingerprint is already in the store are reused instead of executed
 * 3. **Assembly**: folds the target's ancestry into an image descriptor
 * 4. **Tagging**: writes the descriptor to the store under its tag
 *
 * A failure anywhere reports BUILD_FAILED and rethrows; no descriptor is written.
 */
export class ImageBuilder {
  constructor(
    private readonly store: LayerStore,
    private readonly resolver: BaseResolver,
    private readonly runner: CommandRunner,
    private readonly reporter: Reporter
  ) {}

  async build(recipe: Recipe, options: BuildOptions = {}): Promise<BuildResult> {
    try {
      return await this.buildImage(recipe, options)
    } catch (error) {
      this.reporter.emit({
        event: 'BUILD_FAILED',
        code: error instanceof StratumError ? error.code : 'UNEXPECTED_ERROR',
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async buildImage(recipe: Recipe, options: BuildOptions): Promise<BuildResult> {
    const startedAt = Date.now()
    const target = options.target ?? defaultTarget(recipe.stages)
    const plan = planStages(recipe.stages, {isExternalBase: ref => this.resolver.accepts(ref)})
    const stages = requiredStages(plan, target)

    await this.store.cleanupStaging()
    if (stages.some(planned => planned.stage.instructions.some(instruction => instruction.kind === 'run'))) {
      await this.runner.check()
    }

    const context = await BuildContext.open(options.contextDir ?? recipe.root, {exclude: [this.store.root]})
    const executor = new StageExecutor(this.store, context, this.runner, this.reporter)

    this.reporter.emit({event: 'BUILD_START', recipe: recipe.name, target, stages: stages.map(p => p.stage.name)})

    const snapshots = new Map<string, Snapshot>()
    const stageLayers = new Map<string, LayerRecord[]>()
    const baseFingerprints = new Map<string, string>()
    const layers: LayerRecord[] = []
    let executed = 0
    let cached = 0

    for (const planned of stages) {
      const base = await this.resolveBase(planned, snapshots)
      if (planned.base.type === 'external') {
        baseFingerprints.set(planned.stage.name, base.fingerprint)
      }

      this.reporter.emit({
        event: 'STAGE_START',
        stage: planned.stage.name,
        base: planned.base.type === 'stage' ? planned.base.name : planned.base.ref
      })

      const result = await executor.execute(planned.stage, base, {
        stageSnapshots: snapshots,
        noCache: options.noCache,
        signal: options.signal,
        stepTimeoutMs: options.stepTimeoutMs
      })

      snapshots.set(planned.stage.name, result.snapshot)
      stageLayers.set(planned.stage.name, result.layers)
      layers.push(...result.layers)
      executed += result.executed
      cached += result.cached

      this.reporter.emit({
        event: 'STAGE_FINISHED',
        stage: planned.stage.name,
        snapshot: result.snapshot.fingerprint,
        executed: result.executed,
        cached: result.cached
      })
    }

    const snapshot = snapshots.get(target)
    if (!snapshot) {
      throw new StratumError('TARGET_NOT_BUILT', `Target stage ${target} was not built`)
    }

    const chain = ancestry(plan, target)
    const imageLayers: string[] = []
    for (const planned of chain) {
      const baseFingerprint = baseFingerprints.get(planned.stage.name)
      if (baseFingerprint) {
        imageLayers.push(baseFingerprint)
      }

      imageLayers.push(...(stageLayers.get(planned.stage.name) ?? []).map(record => record.fingerprint))
    }

    const image = assembleImage({plan, target, snapshot, layers: imageLayers, name: options.tag ?? recipe.name})
    this.reporter.emit({event: 'IMAGE_ASSEMBLED', image: image.name, digest: image.digest})

    await this.store.saveImage(image)
    this.reporter.emit({
      event: 'BUILD_FINISHED',
      image: image.name,
      digest: image.digest,
      executed,
      cached,
      durationMs: Date.now() - startedAt
    })

    return {image, layers, executed, cached}
  }

  private async resolveBase(planned: PlannedStage, snapshots: Map<string, Snapshot>): Promise<Snapshot> {
    if (planned.base.type === 'external') {
      return this.resolver.resolve(planned.base.ref, this.store)
    }

    const base = snapshots.get(planned.base.name)
    if (!base) {
      throw new StratumError('STAGE_NOT_BUILT', `Stage ${planned.base.name} has not been built`)
    }

    return base
  }
}
