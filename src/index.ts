export { applyAction, resolveDestination } from "./actions.js";
export type { ApplyOutcome, ApplyOptions, DestinationPlan } from "./actions.js";
export {
  compareBuckets,
  compareCodePoints,
  fits,
  fittingBuckets,
  possibleBuckets,
  selectBucket,
} from "./bucket.js";
export { channel, Receiver, WaitSet } from "./channel.js";
export type { RecvResult, Sender } from "./channel.js";
export {
  activateConfig,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "./config.js";
export type {
  ActionKind,
  Bucket,
  ConfigSnapshot,
  OverrideAction,
  RecursiveMode,
  WatchSpec,
} from "./config.js";
export {
  collectEntries,
  dispatchPath,
  handleEvent,
  runOneShot,
} from "./dispatch.js";
export type { DispatchOutcome, DispatchRecord } from "./dispatch.js";
export {
  ActionExecutionError,
  ConfigParseError,
  PathEncodingError,
  TidyError,
  WatchSetupError,
} from "./errors.js";
export {
  ChokidarSourceFactory,
  createConfigSource,
  createWatchSource,
} from "./event-source.js";
export type { EventSource, EventSourceFactory } from "./event-source.js";
export type { SourceMessage, WatchEvent } from "./events.js";
export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
} from "./logger.js";
export type { LogEntry, Logger, LogLevel } from "./logger.js";
export { WatchSupervisor } from "./supervisor.js";
export type { SupervisorState } from "./supervisor.js";
