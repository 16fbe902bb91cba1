import process from 'node:process'
import {createActionRegistry, type ActionRegistry, type Collaborators} from '../actions/index.js'
import {LocalEnvironmentProvider, type EnvironmentProvider} from '../engine/index.js'
import type {JobSpec, PipelineResult, Workflow} from '../types.js'
import {JobRunner, type JobRunOptions, type PlanOptions} from './job-runner.js'
import {ConsoleReporter, type Reporter} from './reporter.js'
import {WorkflowLoader} from './workflow-loader.js'

export type GridCiOptions = {
  provider?: EnvironmentProvider;
  reporter?: Reporter;
  /** Replaces some of the collaborators behind the built-in actions. */
  collaborators?: Partial<Collaborators>;
  /** Working tree jobs run in, when no provider is given. */
  workdir?: string;
}

export class GridCi {
  readonly loader: WorkflowLoader
  readonly runner: JobRunner
  readonly actions: ActionRegistry

  constructor(options: GridCiOptions = {}) {
    const provider = options.provider ?? new LocalEnvironmentProvider({workdir: options.workdir ?? process.cwd()})
    this.loader = new WorkflowLoader()
    this.actions = createActionRegistry(options.collaborators)
    this.runner = new JobRunner(provider, this.actions, options.reporter ?? new ConsoleReporter())
  }

  async load(filePath: string): Promise<Workflow> {
    return this.loader.load(filePath)
  }

  plan(workflow: Workflow, options?: PlanOptions): JobSpec[] {
    return this.runner.plan(workflow, options)
  }

  async run(workflow: Workflow, options?: JobRunOptions): Promise<PipelineResult> {
    return this.runner.run(workflow, options)
  }

  cancelJob(jobSpecId: string): boolean {
    return this.runner.cancelJob(jobSpecId)
  }
}
