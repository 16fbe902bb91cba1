#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import pino from 'pino'
import {registerPlanCommand} from './commands/plan.js'
import {registerRunCommand} from './commands/run.js'
import {describeError, exitCodeFor, type GlobalOptions} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('gridci')
    .description('Matrix CI runner: expands workflow jobs over a build matrix and runs them')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerPlanCommand(program)

  try {
    await program.parseAsync()
  } catch (error: unknown) {
    if (program.opts<GlobalOptions>().json) {
      pino().error({err: error}, describeError(error))
    } else {
      console.error(chalk.red(describeError(error)))
    }

    process.exitCode = exitCodeFor(error)
  }
}

await main()
