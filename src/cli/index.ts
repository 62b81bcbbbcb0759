#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {StratumError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerExportCommand} from './commands/export.js'
import {registerImagesCommand} from './commands/images.js'
import {registerInspectCommand} from './commands/inspect.js'
import {registerPruneCommand} from './commands/prune.js'
import {registerRmiCommand} from './commands/rmi.js'
import {registerRunCommand} from './commands/run.js'

async function main() {
  const program = new Command()

  program
    .name('stratum')
    .description('Layered image builder and service supervisor')
    .version('0.1.0')
    .option('--store <path>', 'Layer store directory (default: $STRATUM_STORE, .stratum.yml store, or ./.stratum)')
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerRunCommand(program)
  registerInspectCommand(program)
  registerImagesCommand(program)
  registerExportCommand(program)
  registerRmiCommand(program)
  registerPruneCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof StratumError) {
    console.error(chalk.red(`${error.code}: ${error.message}`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
