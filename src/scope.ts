/**
 * CancellationScope for visibility-scope - observer-counted task lifetimes
 */

import { context as otelContext, ROOT_CONTEXT } from "@opentelemetry/api";
import createDebug from "debug";
import { ObserverCountError, TaskCancelledError } from "./errors.js";
import { globalExecutor } from "./executor.js";
import { createLogger } from "./logger.js";
import { TaskHandle, type TaskSettlement } from "./task.js";
import type {
	DispatchMode,
	Executor,
	Logger,
	Operation,
	ScopeHooks,
	ScopeLoggingOptions,
	ScopeMetrics,
	SubmitOptions,
	TaskKey,
	TaskPriority,
	Tracer,
} from "./types.js";

const debugScope = createDebug("visibility-scope:scope");

let scopeIdCounter = 0;

function isDetached(mode: DispatchMode): boolean {
	return mode === "detached" || mode === "immediate-detached";
}

function isImmediate(mode: DispatchMode): boolean {
	return mode === "immediate" || mode === "immediate-detached";
}

/**
 * Options for creating a CancellationScope
 */
export interface ScopeOptions extends ScopeLoggingOptions {
	/**
	 * Optional name, used in log lines, spans and debug output.
	 * Defaults to "scope-<id>".
	 */
	name?: string;
	/**
	 * Executor for submissions that do not name one (default: globalExecutor)
	 */
	executor?: Executor;
	/**
	 * Priority for submissions that do not name one (default: "medium")
	 */
	priority?: TaskPriority;
	/**
	 * Throw ObserverCountError when deactivate() drives the observer count
	 * below zero. The count is clamped and tasks are flushed before the throw.
	 * When false (the default) the violation is only reported.
	 */
	strict?: boolean;
	/**
	 * Optional OpenTelemetry tracer. When provided, every dispatched task
	 * gets a span.
	 */
	tracer?: Tracer;
	/**
	 * Optional lifecycle hooks for scope events.
	 */
	hooks?: ScopeHooks;
	/**
	 * Enable metrics collection (default: false)
	 */
	metrics?: boolean;
}

/**
 * One observer's hold on a scope. Ending it deactivates the scope once;
 * later calls do nothing.
 */
export interface Observation extends Disposable {
	readonly active: boolean;
	end(): void;
}

/**
 * A reference-counted cancellation scope.
 *
 * Observers call `activate()` when they become active and `deactivate()`
 * when they stop. Work submitted while at least one observer is active is
 * dispatched and tracked; work submitted while none is active is dropped.
 * When the last observer deactivates, every tracked task is cancelled.
 *
 * The scope belongs to the event loop that owns it. Calls made while another
 * call is still updating the scope (from an immediate task's synchronous
 * code, an abort listener, a hook or an inline executor) are queued and
 * applied, in order, as soon as that call finishes.
 *
 * @example
 * ```typescript
 * const s = scope({ name: "profile-screen" })
 *
 * s.activate()
 * s.submit(async ({ signal }) => {
 *   const res = await fetch("/api/profile", { signal })
 *   render(await res.json())
 * }, { key: "profile" })
 *
 * s.deactivate() // the fetch is aborted
 * ```
 */
export class CancellationScope {
	readonly name: string;
	private readonly id: number;
	private count = 0;
	private readonly anonymousTasks = new Set<TaskHandle>();
	private readonly keyedTasks = new Map<TaskKey, TaskHandle>();
	private mutating = false;
	private readonly deferred: (() => void)[] = [];
	private readonly executor: Executor;
	private readonly defaultPriority: TaskPriority;
	private readonly strict: boolean;
	private readonly tracer: Tracer | undefined;
	private readonly hooks: ScopeHooks | undefined;
	private readonly logger: Logger;
	private readonly enableMetrics: boolean;
	private readonly metricsData = {
		tasksSubmitted: 0,
		tasksDispatched: 0,
		tasksDiscarded: 0,
		tasksSuperseded: 0,
		tasksCancelled: 0,
		tasksCompleted: 0,
		tasksFailed: 0,
		flushes: 0,
		violations: 0,
		totalTaskDuration: 0,
	};

	constructor(options?: ScopeOptions) {
		this.id = ++scopeIdCounter;
		this.name = options?.name ?? `scope-${this.id}`;
		this.executor = options?.executor ?? globalExecutor;
		this.defaultPriority = options?.priority ?? "medium";
		this.strict = options?.strict ?? false;
		this.tracer = options?.tracer;
		this.hooks = options?.hooks;
		this.logger = createLogger(this.name, options?.logger, options?.logLevel);
		this.enableMetrics = options?.metrics ?? false;

		if (debugScope.enabled) {
			debugScope(
				"[%s] creating scope (executor: %s, priority: %s, strict: %s, tracer: %s)",
				this.name,
				this.executor.name,
				this.defaultPriority,
				this.strict ? "yes" : "no",
				this.tracer ? "yes" : "no",
			);
		}
	}

	/**
	 * Number of currently active observers.
	 */
	get observerCount(): number {
		return this.count;
	}

	get isObserved(): boolean {
		return this.count > 0;
	}

	/**
	 * Live tasks: anonymous tasks in submission order, then keyed tasks.
	 */
	get tasks(): readonly TaskHandle[] {
		return [...this.anonymousTasks, ...this.keyedTasks.values()];
	}

	get taskCount(): number {
		return this.anonymousTasks.size + this.keyedTasks.size;
	}

	/**
	 * Keys that currently have a live task.
	 */
	get keys(): readonly TaskKey[] {
		return [...this.keyedTasks.keys()];
	}

	/**
	 * The live task stored under `key`, if any.
	 */
	taskFor(key: TaskKey): TaskHandle | undefined {
		return this.keyedTasks.get(key);
	}

	/**
	 * Register an active observer.
	 */
	activate(): void {
		this.serialize(() => {
			this.count += 1;
			if (debugScope.enabled) {
				debugScope("[%s] activated (observers: %d)", this.name, this.count);
			}
			this.flush();
			this.hooks?.onActivate?.(this.count);
		});
	}

	/**
	 * Unregister an active observer. The call that brings the count to zero
	 * cancels every live task.
	 *
	 * @throws {ObserverCountError} In strict mode, when called more often
	 *   than activate()
	 */
	deactivate(): void {
		this.serialize(() => {
			const next = this.count - 1;
			if (next >= 0) {
				this.count = next;
				if (debugScope.enabled) {
					debugScope("[%s] deactivated (observers: %d)", this.name, next);
				}
				this.flush();
				this.hooks?.onDeactivate?.(next);
				return;
			}

			const violation = new ObserverCountError(this.name, next);
			this.count = 0;
			this.metricsData.violations++;
			if (debugScope.enabled) {
				debugScope("[%s] %s", this.name, violation.message);
			}
			this.logger.warn(violation.message);
			this.flush();
			this.hooks?.onViolation?.(violation);
			if (this.strict) {
				throw violation;
			}
		});
	}

	/**
	 * Submit a unit of work.
	 *
	 * Dropped without running if no observer is active. Otherwise dispatched
	 * according to `options` and tracked until it settles or the scope
	 * flushes. With a `key`, a live task under the same key is cancelled
	 * before the new work is dispatched.
	 *
	 * @example
	 * ```typescript
	 * s.submit(({ signal }) => search(query, signal), {
	 *   key: "search",
	 *   priority: "high",
	 * })
	 * ```
	 */
	submit(operation: Operation, options?: SubmitOptions): void {
		this.serialize(() => {
			this.dispatch(operation, options ?? {});
		});
	}

	/**
	 * Activate the scope for the lifetime of the returned observation.
	 *
	 * @example
	 * ```typescript
	 * {
	 *   using _visible = s.observe()
	 *   s.submit(() => refresh())
	 * } // deactivated here
	 * ```
	 */
	observe(): Observation {
		this.activate();
		let active = true;
		const end = (): void => {
			if (!active) return;
			active = false;
			this.deactivate();
		};
		return {
			get active() {
				return active;
			},
			end,
			[Symbol.dispose]: end,
		};
	}

	/**
	 * Activate the scope until `signal` aborts or the observation is ended,
	 * whichever comes first. An already aborted signal activates nothing.
	 */
	observeWhile(signal: AbortSignal): Observation {
		if (signal.aborted) {
			return {
				active: false,
				end: () => {},
				[Symbol.dispose]: () => {},
			};
		}

		const observation = this.observe();
		const onAbort = (): void => {
			if (debugScope.enabled) {
				debugScope("[%s] observed signal aborted", this.name);
			}
			observation.end();
		};
		signal.addEventListener("abort", onAbort, { once: true });
		const end = (): void => {
			signal.removeEventListener("abort", onAbort);
			observation.end();
		};
		return {
			get active() {
				return observation.active;
			},
			end,
			[Symbol.dispose]: end,
		};
	}

	/**
	 * Get current metrics for this scope.
	 * @returns Current metrics or undefined if metrics not enabled
	 */
	metrics(): ScopeMetrics | undefined {
		if (!this.enableMetrics) return undefined;

		const m = this.metricsData;
		return {
			tasksSubmitted: m.tasksSubmitted,
			tasksDispatched: m.tasksDispatched,
			tasksDiscarded: m.tasksDiscarded,
			tasksSuperseded: m.tasksSuperseded,
			tasksCancelled: m.tasksCancelled,
			tasksCompleted: m.tasksCompleted,
			tasksFailed: m.tasksFailed,
			flushes: m.flushes,
			violations: m.violations,
			observerCount: this.count,
			liveTasks: this.taskCount,
			avgTaskDuration:
				m.tasksCompleted > 0 ? m.totalTaskDuration / m.tasksCompleted : 0,
		};
	}

	private dispatch(operation: Operation, options: SubmitOptions): void {
		this.metricsData.tasksSubmitted++;
		const key = options.key;

		if (this.count === 0) {
			const name = options.name ?? "anonymous task";
			if (debugScope.enabled) {
				debugScope('[%s] no observers, discarding "%s"', this.name, name);
			}
			this.metricsData.tasksDiscarded++;
			this.hooks?.onDiscard?.(name, key);
			return;
		}

		// The superseded task is cancelled before its replacement exists
		let superseded: TaskHandle | undefined;
		if (key !== undefined) {
			superseded = this.keyedTasks.get(key);
			if (superseded) {
				this.keyedTasks.delete(key);
				superseded.cancel(
					new TaskCancelledError("superseded", superseded.name),
				);
				this.metricsData.tasksSuperseded++;
				if (debugScope.enabled) {
					debugScope(
						'[%s] "%s" superseded by new task under the same key',
						this.name,
						superseded.name,
					);
				}
			}
		}

		const mode = options.mode ?? "normal";
		const task = new TaskHandle({
			operation,
			name: options.name,
			key,
			mode,
			priority: options.priority ?? this.defaultPriority,
			parentContext: isDetached(mode) ? ROOT_CONTEXT : otelContext.active(),
			tracer: this.tracer,
			scopeName: this.name,
			onSettled: (settledTask, settlement) => {
				// Usually reached from a promise callback with no caller to throw to
				try {
					this.serialize(() => {
						this.release(settledTask, settlement);
					});
				} catch (error) {
					if (debugScope.enabled) {
						debugScope("[%s] error after task settled: %s", this.name, error);
					}
					this.logger.error(
						`error while releasing "${settledTask.name}"`,
						error,
					);
				}
			},
		});

		if (key !== undefined) {
			this.keyedTasks.set(key, task);
		} else {
			this.anonymousTasks.add(task);
		}
		this.metricsData.tasksDispatched++;

		const executor = options.executor ?? this.executor;
		const immediate = isImmediate(mode);
		if (debugScope.enabled) {
			debugScope(
				'[%s] dispatching "%s" (%s, %s priority, executor: %s, live: %d)',
				this.name,
				task.name,
				mode,
				task.priority,
				immediate ? "caller" : executor.name,
				this.taskCount,
			);
		}
		if (immediate) {
			task.run();
		} else {
			executor.enqueue(task);
		}

		if (superseded) {
			this.hooks?.onSupersede?.(key, superseded);
		}
		this.hooks?.onDispatch?.(task);
	}

	/**
	 * Cancel and drop every live task once no observer is left.
	 */
	private flush(): void {
		if (this.count !== 0) return;
		const cancelled = this.taskCount;
		if (cancelled === 0) return;

		if (debugScope.enabled) {
			debugScope(
				"[%s] no observers left, cancelling %d tasks",
				this.name,
				cancelled,
			);
		}
		// Abort listeners run inside cancel(), so the collections are emptied first
		const doomed = [...this.anonymousTasks, ...this.keyedTasks.values()];
		this.anonymousTasks.clear();
		this.keyedTasks.clear();
		for (const task of doomed) {
			task.cancel(new TaskCancelledError("deactivated", task.name));
		}

		this.metricsData.flushes++;
		this.hooks?.onFlush?.(cancelled);
	}

	/**
	 * Forget a settled task and report its outcome.
	 */
	private release(task: TaskHandle, settlement: TaskSettlement): void {
		if (task.key !== undefined) {
			if (this.keyedTasks.get(task.key) === task) {
				this.keyedTasks.delete(task.key);
			}
		} else {
			this.anonymousTasks.delete(task);
		}

		switch (settlement.state) {
			case "completed":
				this.metricsData.tasksCompleted++;
				this.metricsData.totalTaskDuration += settlement.durationMs;
				break;
			case "failed":
				this.metricsData.tasksFailed++;
				this.logger.error(`task "${task.name}" failed`, settlement.error);
				break;
			case "cancelled":
				this.metricsData.tasksCancelled++;
				break;
		}

		try {
			this.hooks?.afterTask?.(task, settlement.durationMs, settlement.error);
		} catch (error) {
			if (debugScope.enabled) {
				debugScope("[%s] afterTask hook threw: %s", this.name, error);
			}
			this.logger.error(`afterTask hook threw for "${task.name}"`, error);
		}
	}

	/**
	 * Single entry point for every state change. A change requested while
	 * another is running is queued behind it; errors are rethrown once the
	 * queue is empty.
	 */
	private serialize(mutation: () => void): void {
		if (this.mutating) {
			this.deferred.push(mutation);
			if (debugScope.enabled) {
				debugScope(
					"[%s] deferring reentrant call (queued: %d)",
					this.name,
					this.deferred.length,
				);
			}
			return;
		}

		this.mutating = true;
		const errors: unknown[] = [];
		let next: (() => void) | undefined = mutation;
		while (next) {
			try {
				next();
			} catch (error) {
				errors.push(error);
			}
			next = this.deferred.shift();
		}
		this.mutating = false;

		if (errors.length === 1) {
			throw errors[0];
		}
		if (errors.length > 1) {
			throw new AggregateError(
				errors,
				`[${this.name}] ${errors.length} errors while updating scope`,
			);
		}
	}
}
