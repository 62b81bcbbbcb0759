import process from 'node:process'
import type {Command} from 'commander'
import {ImageBuilder} from '../../core/image-builder.js'
import {RecipeLoader, resolveRecipeFile} from '../../core/recipe-loader.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {DirectoryBaseResolver, ScratchBaseResolver} from '../../engine/base-resolver.js'
import {HostCommandRunner} from '../../engine/shell-runner.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {openProject} from '../utils.js'

type BuildCommandOptions = {
  tag?: string;
  context?: string;
  target?: string;
  cache: boolean;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build an image from a recipe')
    .argument('[recipe]', 'Recipe file or directory (default: current directory)')
    .option('-t, --tag <tag>', 'Image tag (default: recipe name)')
    .option('--context <dir>', 'Build context directory (default: recipe directory)')
    .option('--target <stage>', 'Stage to build (default: last stage)')
    .option('--no-cache', 'Execute every step even when a cached layer exists')
    .option('--verbose', 'Stream step output in real-time (interactive mode)')
    .action(async (recipeArg: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      const {store, config, json} = await openProject(cmd)
      const recipeFile = await resolveRecipeFile(recipeArg ?? process.cwd())
      const recipe = await new RecipeLoader().load(recipeFile)

      const resolver = new DirectoryBaseResolver(config.bases ?? {}, process.cwd(), new ScratchBaseResolver())
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const builder = new ImageBuilder(store, resolver, new HostCommandRunner(), reporter)

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const {image} = await builder.build(recipe, {
          tag: options.tag,
          target: options.target,
          contextDir: options.context,
          noCache: !options.cache,
          signal: controller.signal
        })
        console.log(json ? JSON.stringify({image: image.name, digest: image.digest}) : image.name)
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
