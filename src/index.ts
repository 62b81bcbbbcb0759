/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ImageBuilder, LayerStore, RecipeLoader, ScratchBaseResolver, HostCommandRunner, ConsoleReporter} from 'stratum'
 *
 * const store = await LayerStore.open('.stratum')
 * const recipe = await new RecipeLoader().load('stratum.yml')
 * const builder = new ImageBuilder(store, new ScratchBaseResolver(), new HostCommandRunner(), new ConsoleReporter())
 * const {image} = await builder.build(recipe, {tag: 'api'})
 * ```
 */

export * from './core/index.js'
export * from './engine/index.js'
export * from './errors.js'
export type * from './types.js'
