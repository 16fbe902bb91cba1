export {CommandRunner, defaultShell, type LogLine, type OnLogLine} from './command-runner.js'
export {ShellCommandRunner, shellInvocation} from './shell-runner.js'
export {
  LocalEnvironmentProvider,
  hostOsFamily,
  osFamilyFromLabel,
  type EnvironmentProvider,
  type ExecutionEnvironment
} from './environment.js'
export type {RunCommandRequest, RunCommandResult} from './types.js'
