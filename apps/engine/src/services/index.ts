export { PassController, runStatus } from './pass-controller';
export type { PassControllerOptions, PassOptions, RunHandle, ScheduledPassOptions, ScheduleHandle } from './pass-controller';
export { WorkflowRunner } from './workflow-runner';
export type { StageGraphSource } from './workflow-runner';
export { StageGraphRunner, graphStatus, toErrorDetail } from './stage-graph-runner';
export type { RunContext, StepExecutionOptions, TaskSource } from './stage-graph-runner';
export { resolveParameters, substituteParameters, validateParameters } from './parameter-resolver';
export type { ResolutionContext, ResolvedParameters, ResolutionError } from './parameter-resolver';
export { RunRecorder } from './run-recorder';
export type { OutcomeLookup } from './run-recorder';
export { TimerTrigger } from './schedule-trigger';
export type { ScheduleTrigger, TriggerHandle } from './schedule-trigger';
