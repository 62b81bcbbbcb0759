import chalk from 'chalk'
import type {Command} from 'commander'
import {formatDuration} from '../../core/utils.js'
import {openProject} from '../utils.js'

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the descriptor of an image')
    .argument('<image>', 'Image tag')
    .action(async (tag: string, _options: Record<string, unknown>, cmd: Command) => {
      const {store, json} = await openProject(cmd)
      const image = await store.loadImage(tag)

      if (json) {
        console.log(JSON.stringify(image, null, 2))
        return
      }

      console.log(chalk.bold(`\nImage: ${chalk.cyan(image.name)}`))
      console.log(`  Digest:      ${image.digest}`)
      console.log(`  Stage:       ${image.stage}`)
      console.log(`  Snapshot:    ${image.snapshot}`)
      console.log(`  Layers:      ${image.layers.length}`)
      console.log(`  Workdir:     ${image.workdir}`)
      console.log(`  Entrypoint:  ${JSON.stringify(image.entrypoint)}`)
      if (image.exposedPorts.length > 0) {
        console.log(`  Ports:       ${image.exposedPorts.join(', ')}`)
      }

      const envNames = Object.keys(image.env)
      if (envNames.length > 0) {
        console.log('  Env:')
        for (const name of envNames) {
          console.log(`    ${name}=${image.env[name]}`)
        }
      }

      if (image.healthcheck) {
        const {command, intervalMs, timeoutMs, startPeriodMs, retries} = image.healthcheck
        console.log(`  Healthcheck: ${JSON.stringify(command)}`)
        console.log(chalk.gray(`               every ${formatDuration(intervalMs)}, timeout ${formatDuration(timeoutMs)}, start period ${formatDuration(startPeriodMs)}, ${retries} retries`))
      }

      console.log()
    })
}
