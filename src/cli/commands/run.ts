import process from 'node:process'
import {stat} from 'node:fs/promises'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadEnvFile} from '../../core/env-file.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {Supervisor, ignoreUnhealthy, stopWhenUnhealthy} from '../../core/supervisor.js'
import {resolveWithin} from '../../core/utils.js'
import {ExecaProcessLauncher} from '../../engine/process-launcher.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {collect, openProject, parseEnvPairs} from '../utils.js'

type RunCommandOptions = {
  env: string[];
  envFile?: string;
  stopWhenUnhealthy?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Launch an image entrypoint and supervise its health')
    .argument('<image>', 'Image tag')
    .option('-e, --env <KEY=VALUE>', 'Override an environment variable (repeatable)', collect, [])
    .option('--env-file <path>', 'Load environment overrides from a dotenv file')
    .option('--stop-when-unhealthy', 'Terminate the process when it turns unhealthy')
    .action(async (tag: string, options: RunCommandOptions, cmd: Command) => {
      const {store, json} = await openProject(cmd)
      const image = await store.loadImage(tag)
      const rootfs = await store.imageRootfs(image)
      const workdir = resolveWithin(rootfs, image.workdir)
      const cwd = workdir && await isDirectory(workdir) ? workdir : rootfs

      const env = {
        ...(options.envFile ? await loadEnvFile(options.envFile) : {}),
        ...parseEnvPairs(options.env)
      }

      const supervisor = new Supervisor({
        image,
        cwd,
        env,
        launcher: new ExecaProcessLauncher(),
        reporter: json ? new ConsoleReporter() : new InteractiveReporter(),
        policy: options.stopWhenUnhealthy ? stopWhenUnhealthy : ignoreUnhealthy
      })

      let stopRequested = false
      const onSignal = () => {
        stopRequested = true
        supervisor.stop().catch((error: unknown) => {
          console.error(chalk.red('Failed to stop process:'), error)
        })
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        await supervisor.start()
        const final = await supervisor.wait()
        process.exitCode = final.exitCode ?? (stopRequested ? 0 : 1)
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}
