import chalk from 'chalk'
import type {Command} from 'commander'
import {dirSize, formatSize} from '../../core/utils.js'
import {openProject} from '../utils.js'

export function registerImagesCommand(program: Command): void {
  program
    .command('images')
    .alias('ls')
    .description('List tagged images')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {store, json} = await openProject(cmd)
      const tags = await store.listImages()

      if (json) {
        console.log(JSON.stringify(tags))
        return
      }

      if (tags.length === 0) {
        console.log(chalk.gray('No images found.'))
        return
      }

      const rows: Array<{name: string; digest: string; stage: string; size: string}> = []
      for (const tag of tags) {
        const image = await store.loadImage(tag)
        const size = await dirSize(store.rootfsPath(image))
        rows.push({name: tag, digest: image.digest.slice(0, 12), stage: image.stage, size: formatSize(size)})
      }

      const nameWidth = Math.max('IMAGE'.length, ...rows.map(r => r.name.length))
      const stageWidth = Math.max('STAGE'.length, ...rows.map(r => r.stage.length))
      const sizeWidth = Math.max('SIZE'.length, ...rows.map(r => r.size.length))
      console.log(chalk.bold(`${'IMAGE'.padEnd(nameWidth)}  ${'DIGEST'.padEnd(12)}  ${'STAGE'.padEnd(stageWidth)}  ${'SIZE'.padStart(sizeWidth)}`))
      for (const row of rows) {
        console.log(`${row.name.padEnd(nameWidth)}  ${row.digest}  ${row.stage.padEnd(stageWidth)}  ${row.size.padStart(sizeWidth)}`)
      }
    })
}
