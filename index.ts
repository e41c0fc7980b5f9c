export {
	DEFAULT_INTERVAL_SECONDS,
	DEFAULT_LOG_FILE,
	MAX_INTERVAL_SECONDS,
	prepareRoots,
	resolveConfig,
	type SyncConfig,
	type SyncConfigInput,
	SyncConfigSchema,
} from "./config.js";
export {
	ConfigurationError,
	describeError,
	RootUnreadableError,
	TreesyncError,
} from "./errors.js";
export {
	createLogger,
	type Logger,
	type LoggerOptions,
	type LogLevel,
} from "./logger.js";
export {
	type PassRunner,
	runScheduler,
	type SchedulerOptions,
	type SchedulerStats,
	sleep,
} from "./scheduler.js";
export { type EventSink, LoggerSink, MemorySink } from "./sink.js";
export {
	DEFAULT_MTIME_TOLERANCE_MS,
	SyncExecutor,
	type SyncExecutorOptions,
} from "./sync.js";
export {
	collectTree,
	createExcludeMatcher,
	entryKind,
	type ExcludeMatcher,
	type WalkOptions,
	walkTree,
} from "./tree.js";
export type {
	ChangeKind,
	EntryFailure,
	EntryKind,
	PassResult,
	PassSummary,
	SyncEvent,
	SyncOperation,
	TreeNode,
} from "./types.js";
