import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {exportImage} from '../../engine/image-export.js'
import {openProject} from '../utils.js'

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Write the root filesystem of an image to a .tar.gz archive')
    .argument('<image>', 'Image tag')
    .argument('<file>', 'Destination archive')
    .action(async (tag: string, file: string, _options: Record<string, unknown>, cmd: Command) => {
      const {store} = await openProject(cmd)
      const destPath = resolve(file)
      const entries = await exportImage(store, tag, destPath)
      console.log(chalk.green(`Exported ${tag} (${entries.length} top-level entr${entries.length === 1 ? 'y' : 'ies'}) to ${destPath}`))
    })
}
