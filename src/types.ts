/**
 * Type definitions and interfaces for visibility-scope
 */

import type { Context, Span, SpanOptions, Tracer } from "@opentelemetry/api";
import type { ObserverCountError } from "./errors.js";
import type { TaskHandle } from "./task.js";

// Re-export OpenTelemetry types for users
export type { Context, Span, SpanOptions, Tracer };

/**
 * Identity of a keyed task. Compared the way `Map` compares keys:
 * primitives by value, objects by reference.
 */
export type TaskKey = unknown;

/**
 * Scheduling hint for dispatched work, highest first.
 */
export type TaskPriority = "high" | "medium" | "low" | "background";

/** Lanes in drain order. */
export const TASK_PRIORITIES: readonly TaskPriority[] = [
	"high",
	"medium",
	"low",
	"background",
];

/**
 * How submitted work is dispatched.
 *
 * - `normal`: queued on the executor, runs inside the caller's tracing context
 * - `detached`: queued on the executor, runs inside the root context
 * - `immediate`: runs synchronously inside `submit` up to its first `await`
 * - `immediate-detached`: runs like `immediate`, inside the root context
 */
export type DispatchMode =
	| "normal"
	| "detached"
	| "immediate"
	| "immediate-detached";

/**
 * Lifecycle state of a task handle.
 */
export type TaskState =
	| "pending"
	| "running"
	| "completed"
	| "failed"
	| "cancelled";

/**
 * Why a handle's signal was aborted.
 */
export type CancelReason = "deactivated" | "superseded" | "cancelled";

/**
 * Context handed to every unit of submitted work.
 */
export interface TaskContext {
	/** Aborted when the scope cancels this task. Check it cooperatively. */
	readonly signal: AbortSignal;
	/** Task name (explicit or `task-<id>`) */
	readonly name: string;
	/** The key the task was submitted under, if any */
	readonly key: TaskKey | undefined;
}

/**
 * A deferred unit of asynchronous work.
 */
export type Operation = (ctx: TaskContext) => void | Promise<void>;

/**
 * A unit of scheduled work as seen by an executor.
 */
export interface Job {
	readonly priority: TaskPriority;
	/** Must not throw. */
	run(): void;
}

/**
 * Where dispatched work runs.
 */
export interface Executor {
	readonly name: string;
	enqueue(job: Job): void;
}

/**
 * Options for a single submission. Every combination of keyed/unkeyed,
 * dispatch mode, priority and executor goes through this one record.
 */
export interface SubmitOptions {
	/**
	 * Optional identity. Submitting under a key that already has a live task
	 * cancels that task before the new one is dispatched.
	 */
	key?: TaskKey;
	/**
	 * Human readable name, used in spans, debug output and hooks.
	 */
	name?: string;
	/**
	 * Priority hint passed to the executor. Defaults to the scope's priority.
	 * Recorded on the handle but not used for scheduling in the immediate
	 * modes, which bypass the executor.
	 */
	priority?: TaskPriority;
	/**
	 * Executor preference. Defaults to the scope's executor.
	 * Ignored in the `immediate` and `immediate-detached` modes.
	 */
	executor?: Executor;
	/**
	 * Dispatch mode (default: "normal")
	 */
	mode?: DispatchMode;
}

/**
 * Lifecycle hooks for scope events.
 * Called only when the scope's bookkeeping is consistent; calling back into
 * the scope from a hook is allowed and is applied after the current operation.
 */
export interface ScopeHooks {
	/** Called after an observer activated the scope */
	onActivate?: (observerCount: number) => void;
	/** Called after an observer deactivated the scope */
	onDeactivate?: (observerCount: number) => void;
	/** Called when the last observer left and live tasks were cancelled */
	onFlush?: (cancelledCount: number) => void;
	/** Called when work was submitted while no observer was active */
	onDiscard?: (name: string, key: TaskKey | undefined) => void;
	/** Called when a keyed task replaced a live task under the same key */
	onSupersede?: (key: TaskKey, previous: TaskHandle) => void;
	/**
	 * Called after a task was stored and handed to its executor. In
	 * `immediate` mode its synchronous prefix has already run.
	 */
	onDispatch?: (task: TaskHandle) => void;
	/**
	 * Called when a task settled (completed, failed or cancelled). Errors
	 * thrown here are logged, not propagated.
	 */
	afterTask?: (task: TaskHandle, durationMs: number, error?: unknown) => void;
	/** Called when deactivate() was called more often than activate() */
	onViolation?: (error: ObserverCountError) => void;
}

/**
 * Metrics collected by a scope
 */
export interface ScopeMetrics {
	/** Number of submit() calls */
	tasksSubmitted: number;
	/** Number of submissions that created a task */
	tasksDispatched: number;
	/** Number of submissions dropped because no observer was active */
	tasksDiscarded: number;
	/** Number of keyed tasks cancelled by a newer task under the same key */
	tasksSuperseded: number;
	/** Number of tasks that ended cancelled */
	tasksCancelled: number;
	/** Number of tasks that completed */
	tasksCompleted: number;
	/** Number of tasks that failed */
	tasksFailed: number;
	/** Number of flushes that cancelled at least one task */
	flushes: number;
	/** Number of observer count violations */
	violations: number;
	/** Current observer count */
	observerCount: number;
	/** Tasks currently held by the scope */
	liveTasks: number;
	/** Average duration of completed tasks in milliseconds */
	avgTaskDuration: number;
}

/**
 * Logger interface for structured logging integration
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Options for scope with logging
 */
export interface ScopeLoggingOptions {
	/** Logger instance */
	logger?: Logger;
	/** Minimum log level for the built-in console logger */
	logLevel?: LogLevel;
}
