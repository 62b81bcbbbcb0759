import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {openProject} from '../utils.js'

export function registerRmiCommand(program: Command): void {
  program
    .command('rmi')
    .description('Remove one or more image tags (layers are freed by prune)')
    .argument('<image...>', 'Image tags to remove')
    .action(async (tags: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {store} = await openProject(cmd)
      for (const tag of tags) {
        if (await store.removeImage(tag)) {
          console.log(chalk.green(`Removed ${tag}`))
        } else {
          console.error(chalk.red(`Image not found: ${tag}`))
          process.exitCode = 1
        }
      }
    })
}
