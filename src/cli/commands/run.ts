import process from 'node:process'
import {resolve} from 'node:path'
import {Option, type Command} from 'commander'
import {GridCi} from '../../core/gridci.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {LocalEnvironmentProvider} from '../../engine/index.js'
import type {PipelineResult} from '../../types.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {collect, getGlobalOptions, parseConcurrency, resolveWorkflowFile, splitList} from '../utils.js'

type RunOptions = {
  job?: string[];
  matrix?: string[];
  concurrency?: number;
  envFile?: string;
  dryRun?: boolean;
  verbose?: boolean;
  workdir?: string;
  strictHost?: boolean;
}

export function exitCodeForResult(result: PipelineResult): number {
  switch (result.status) {
    case 'failed': {
      return 1
    }

    case 'cancelled': {
      return 130
    }

    default: {
      return 0
    }
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the jobs of a workflow')
    .argument('[workflow]', 'Workflow file or directory (default: current directory)')
    .option('-j, --job <ids>', 'Run only these jobs (repeatable or comma-separated)', collect)
    .option('-m, --matrix <values>', 'Run only these matrix values (repeatable or comma-separated)', collect)
    .addOption(
      new Option('-c, --concurrency <number>', 'Max parallel jobs (default: CPU count)')
        .env('GRIDCI_CONCURRENCY')
        .argParser(parseConcurrency)
    )
    .option('--env-file <path>', 'Load environment variables from a dotenv file for all jobs')
    .option('--dry-run', 'Validate the workflow and show what would run without executing')
    .option('--verbose', 'Stream command output in real-time (interactive mode)')
    .option('--workdir <path>', 'Working tree the jobs run in (default: current directory)')
    .option('--strict-host', 'Refuse jobs whose runs-on label names another OS than this host')
    .action(async (workflowArg: string | undefined, options: RunOptions, cmd: Command) => {
      const workflowFile = await resolveWorkflowFile(workflowArg)
      const {json} = getGlobalOptions(cmd)
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const provider = new LocalEnvironmentProvider({
        workdir: resolve(options.workdir ?? process.cwd()),
        strictHost: options.strictHost
      })

      const ci = new GridCi({provider, reporter})
      const workflow = await ci.load(workflowFile)

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const result = await ci.run(workflow, {
          jobs: splitList(options.job),
          matrix: splitList(options.matrix),
          concurrency: options.concurrency,
          envFile: options.envFile,
          dryRun: options.dryRun,
          signal: controller.signal
        })
        process.exitCode = exitCodeForResult(result)
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
