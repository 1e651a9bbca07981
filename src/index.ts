// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { SchedulerConfig, DeepPartial } from "./config.js";

// Errors
export {
  SchedulerError,
  ParseError,
  MalformedTreeError,
  InvalidConfigurationError,
  DeadlockError,
  StoreError,
  isSchedulerError,
} from "./errors.js";
export type { ErrorCode, SourceLocation } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  PolicySchema,
  PositiveIntSchema,
  LogLevelSchema,
  ConfigOverridesSchema,
  RunReportSchema,
  ComparisonReportSchema,
  ReportSchema,
} from "./schemas.js";
export type { ConfigOverrides } from "./schemas.js";

// Tree
export type { TaskId, TaskNode, TaskTree, LoadedTree } from "./tree/types.js";
export {
  TreeBuilder,
  parseTaskToken,
  getTask,
  traverse,
  traverseWithDepth,
  collectTasks,
  validateTree,
  depthOf,
} from "./tree/task-tree.js";
export { parseTree, loadTreeFile } from "./tree/loader.js";
export type { LoadOptions } from "./tree/loader.js";
export { formatTreeOutline, toDot } from "./tree/printer.js";

// Scheduling
export { schedule, assertProcessorCount } from "./scheduler/engine.js";
export { comparePolicies, summarizeTree, pickBestPolicy } from "./scheduler/comparator.js";
export { POLICIES } from "./scheduler/types.js";
export type {
  Policy,
  PolicyVerdict,
  PolicyComparison,
  ScheduleOptions,
  ScheduleResult,
  TimelineEntry,
  TreeSummary,
} from "./scheduler/types.js";

// Reports
export {
  buildRunReport,
  buildComparisonReport,
  formatRunReport,
  formatComparisonTable,
  formatTimeline,
  describeReport,
  roundRatio,
} from "./report/report.js";
export type { Report, RunReport, ComparisonReport, StoredReport } from "./report/types.js";

// Persistence
export { ReportStore } from "./persistence/store.js";

// CLI
export { createProgram, runCli } from "./cli/program.js";
export type { CliIO } from "./cli/program.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel, setLogSink, LOG_LEVELS } from "./utils/logger.js";
export type { LogLevel, Logger, LogSink } from "./utils/logger.js";
