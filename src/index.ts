/**
 * visibility-scope - Observer-counted cancellation scopes
 *
 * A scope runs asynchronous work only while at least one observer is
 * active, and cancels all of it when the last observer goes away.
 */

export {
	checkpoint,
	isCancellation,
	onCancel,
	sleep,
	throwIfCancelled,
	whenCancelled,
} from "./cancellation.js";
export { ObserverCountError, TaskCancelledError } from "./errors.js";
export {
	type DrainScheduler,
	globalExecutor,
	inlineExecutor,
	microtaskExecutor,
	PriorityExecutor,
} from "./executor.js";
export { scope } from "./factory.js";
export { ConsoleLogger, createLogger, type LogSink, NoOpLogger } from "./logger.js";
export {
	CancellationScope,
	type Observation,
	type ScopeOptions,
} from "./scope.js";
export { TaskHandle, type TaskSettlement } from "./task.js";
export {
	type CancelReason,
	type Context,
	type DispatchMode,
	type Executor,
	type Job,
	type Logger,
	type LogLevel,
	type Operation,
	type ScopeHooks,
	type ScopeLoggingOptions,
	type ScopeMetrics,
	type Span,
	type SpanOptions,
	type SubmitOptions,
	TASK_PRIORITIES,
	type TaskContext,
	type TaskKey,
	type TaskPriority,
	type TaskState,
	type Tracer,
} from "./types.js";
