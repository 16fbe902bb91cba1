/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {GridCi} from 'gridci'
 *
 * const ci = new GridCi({workdir: process.cwd()})
 * const workflow = await ci.load('.github/workflows/ci.yml')
 * const result = await ci.run(workflow, {matrix: ['x86_64-linux'], concurrency: 2})
 * console.log(result.status)
 * ```
 */

export * from './core/index.js'

export {
  CommandRunner,
  ShellCommandRunner,
  LocalEnvironmentProvider,
  defaultShell,
  hostOsFamily,
  osFamilyFromLabel,
  shellInvocation,
  type EnvironmentProvider,
  type ExecutionEnvironment,
  type LogLine,
  type OnLogLine,
  type RunCommandRequest,
  type RunCommandResult
} from './engine/index.js'

export {
  ActionRegistry,
  createActionRegistry,
  defaultCollaborators,
  runInShell,
  type Action,
  type ActionContext,
  type ActionResult,
  type Collaborators,
  type PackageInstaller,
  type SourceFetcher,
  type StaticChecker,
  type SubmoduleMode,
  type ToolchainCommand,
  type ToolchainInvoker,
  type ToolchainRequest
} from './actions/index.js'

export {
  GridError,
  ConfigurationError,
  ValidationError,
  EmptyDimensionError,
  DanglingOverrideError,
  DuplicateMatrixValueError,
  UnknownFieldError,
  InvalidConditionError,
  UnknownActionError,
  MissingInputError,
  ExecutionError,
  CommandNotAvailableError,
  StepFailedError
} from './errors.js'

export type * from './types.js'
