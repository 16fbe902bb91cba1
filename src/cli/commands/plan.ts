import chalk from 'chalk'
import type {Command} from 'commander'
import {evaluateCondition} from '../../core/condition.js'
import {GridCi} from '../../core/gridci.js'
import type {JobSpec} from '../../types.js'
import {collect, getGlobalOptions, resolveWorkflowFile, splitList} from '../utils.js'

export type PlanRow = {
  id: string;
  name: string;
  runsOn: string;
  /** Steps whose condition holds for this job. */
  steps: string[];
  /** Steps skipped by their condition. */
  skipped: string[];
}

export function planRows(specs: JobSpec[]): PlanRow[] {
  return specs.map(spec => {
    const steps: string[] = []
    const skipped: string[] = []
    for (const step of spec.steps) {
      if (step.if && !evaluateCondition(step.if, spec.fields)) {
        skipped.push(step.id)
      } else {
        steps.push(step.id)
      }
    }

    return {id: spec.id, name: spec.name, runsOn: spec.runsOn, steps, skipped}
  })
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the concrete jobs a workflow expands to, without running anything')
    .argument('[workflow]', 'Workflow file or directory (default: current directory)')
    .option('-j, --job <ids>', 'Only these jobs (repeatable or comma-separated)', collect)
    .option('-m, --matrix <values>', 'Only these matrix values (repeatable or comma-separated)', collect)
    .option('--fields', 'Also print the resolved matrix fields of each job')
    .action(async (workflowArg: string | undefined, options: {job?: string[]; matrix?: string[]; fields?: boolean}, cmd: Command) => {
      const workflowFile = await resolveWorkflowFile(workflowArg)
      const {json} = getGlobalOptions(cmd)
      const ci = new GridCi()
      const workflow = await ci.load(workflowFile)
      const specs = ci.plan(workflow, {jobs: splitList(options.job), matrix: splitList(options.matrix)})

      if (json) {
        console.log(JSON.stringify(specs, null, 2))
        return
      }

      const rows = planRows(specs)
      const jobWidth = Math.max('JOB'.length, ...rows.map(r => r.id.length))
      const runsOnWidth = Math.max('RUNS-ON'.length, ...rows.map(r => r.runsOn.length))

      console.log(chalk.bold(`${'JOB'.padEnd(jobWidth)}  ${'RUNS-ON'.padEnd(runsOnWidth)}  STEPS`))
      for (const [i, row] of rows.entries()) {
        const skipped = row.skipped.length > 0 ? chalk.gray(` (skips ${row.skipped.join(', ')})`) : ''
        console.log(`${row.id.padEnd(jobWidth)}  ${row.runsOn.padEnd(runsOnWidth)}  ${row.steps.join(', ')}${skipped}`)

        if (options.fields) {
          for (const [name, value] of Object.entries(specs[i].fields)) {
            console.log(chalk.gray(`${''.padEnd(jobWidth)}  ${name} = ${JSON.stringify(value)}`))
          }
        }
      }
    })
}
