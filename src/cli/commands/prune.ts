import chalk from 'chalk'
import type {Command} from 'commander'
import {openProject} from '../utils.js'

export function registerPruneCommand(program: Command): void {
  program
    .command('prune')
    .description('Remove layers not referenced by any tagged image')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {store, json} = await openProject(cmd)
      await store.cleanupStaging()
      const removed = await store.prune()

      if (json) {
        console.log(JSON.stringify({removed}))
      } else if (removed === 0) {
        console.log(chalk.gray('No unreferenced layers to remove.'))
      } else {
        console.log(chalk.green(`Removed ${removed} layer${removed > 1 ? 's' : ''}.`))
      }
    })
}
