/**
 * Pipeline scheduling: stage machine, run loop, monitoring and archive.
 */

export {
  PipelineScheduler,
  controlDestinationFor,
  type PipelineSchedulerOptions,
  type RunHandle,
  type RunStatusReport,
  type StartOptions,
} from "./scheduler.js";
export { StageRunner, SCHEDULER_WRITER, type StageContext, type StageResult } from "./stage-runner.js";
export { StageMachine, canTransition, isTerminal, type StageTransition } from "./state-machine.js";
export { RunMonitor, type RunEvent, type RunEventType, type RunMetrics } from "./run-monitor.js";
export { InMemoryRunArchive, JsonFileRunArchive, type RunArchive } from "./run-archive.js";
