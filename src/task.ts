/**
 * Task handle for visibility-scope
 */

import {
	type Attributes,
	type Context,
	context as otelContext,
	type Span,
	SpanStatusCode,
	type Tracer,
	trace,
} from "@opentelemetry/api";
import createDebug from "debug";
import { TaskCancelledError } from "./errors.js";
import type {
	DispatchMode,
	Job,
	Operation,
	TaskKey,
	TaskPriority,
	TaskState,
} from "./types.js";

const debugTask = createDebug("visibility-scope:task");

let taskIdCounter = 0;

// Structural check: promises from another realm fail `instanceof Promise`
function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}

/**
 * Final outcome of a task, reported once.
 */
export interface TaskSettlement {
	state: "completed" | "failed" | "cancelled";
	/** Time from start to settlement; 0 if the task never started */
	durationMs: number;
	/** The thrown value for `failed`, the abort reason for `cancelled` */
	error?: unknown;
}

export interface TaskHandleInit {
	operation: Operation;
	name?: string;
	key?: TaskKey;
	mode: DispatchMode;
	priority: TaskPriority;
	/** Context the operation (and its span) is parented to */
	parentContext: Context;
	tracer?: Tracer;
	scopeName?: string;
	onSettled?: (task: TaskHandle, settlement: TaskSettlement) => void;
}

/**
 * A unit of work that has been dispatched to an executor.
 *
 * The handle is the executor's job: `run()` starts the operation once.
 * `cancel()` aborts the handle's signal; a handle cancelled before it starts
 * never invokes its operation. Cancellation is cooperative, so a running
 * operation stops only where it checks its signal.
 */
export class TaskHandle implements Job, Disposable {
	readonly id: number;
	readonly name: string;
	readonly key: TaskKey | undefined;
	readonly mode: DispatchMode;
	readonly priority: TaskPriority;
	private readonly operation: Operation;
	private readonly abortController = new AbortController();
	private readonly runContext: Context;
	private readonly span: Span | undefined;
	private readonly onSettled:
		| ((task: TaskHandle, settlement: TaskSettlement) => void)
		| undefined;
	private status: TaskState = "pending";
	private startTime: number | undefined;
	private readonly settledPromise: Promise<void>;
	private readonly resolveSettled: () => void;

	constructor(init: TaskHandleInit) {
		this.id = ++taskIdCounter;
		this.name = init.name ?? `task-${this.id}`;
		this.key = init.key;
		this.mode = init.mode;
		this.priority = init.priority;
		this.operation = init.operation;
		this.onSettled = init.onSettled;

		let resolve: () => void = () => {};
		this.settledPromise = new Promise<void>((r) => {
			resolve = r;
		});
		this.resolveSettled = resolve;

		// Span exists from dispatch, so queueing time is part of it
		if (init.tracer) {
			const attributes: Attributes = {
				"task.id": this.id,
				"task.mode": this.mode,
				"task.priority": this.priority,
				"task.keyed": init.key !== undefined,
			};
			if (typeof init.key === "string" || typeof init.key === "number") {
				attributes["task.key"] = init.key;
			}
			if (init.scopeName !== undefined) {
				attributes["scope.name"] = init.scopeName;
			}
			this.span = init.tracer.startSpan(
				init.name ?? "scope.task",
				{ attributes },
				init.parentContext,
			);
			this.runContext = trace.setSpan(init.parentContext, this.span);
		} else {
			this.runContext = init.parentContext;
		}
	}

	/**
	 * Signal observed by the operation. Aborted on cancellation.
	 */
	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	get state(): TaskState {
		return this.status;
	}

	/**
	 * Whether cancellation has been requested.
	 */
	get isCancelled(): boolean {
		return this.abortController.signal.aborted;
	}

	get isSettled(): boolean {
		return (
			this.status === "completed" ||
			this.status === "failed" ||
			this.status === "cancelled"
		);
	}

	/**
	 * Resolves once the task has completed, failed or been cancelled.
	 * Never rejects.
	 */
	get settled(): Promise<void> {
		return this.settledPromise;
	}

	/**
	 * Request cancellation.
	 *
	 * @param reason - Abort reason; defaults to a `TaskCancelledError("cancelled")`
	 * @returns `true` if this call requested cancellation, `false` if it was
	 *   already requested or the task had settled
	 */
	cancel(reason?: unknown): boolean {
		if (this.abortController.signal.aborted || this.isSettled) {
			return false;
		}
		const abortReason = reason ?? new TaskCancelledError("cancelled", this.name);
		if (debugTask.enabled) {
			debugTask("[%s] cancelling (%s): %s", this.name, this.status, abortReason);
		}
		this.span?.addEvent("task.cancelled", {
			"task.cancel_reason":
				abortReason instanceof TaskCancelledError
					? abortReason.reason
					: String(abortReason),
			"task.started": this.status === "running",
		});

		if (this.status === "pending") {
			this.status = "cancelled";
			this.abortController.abort(abortReason);
			this.settle("cancelled", abortReason);
			return true;
		}

		this.abortController.abort(abortReason);
		return true;
	}

	/**
	 * Start the operation. Runs at most once; a cancelled handle does nothing.
	 * Never throws: failures are captured as the task's outcome.
	 */
	run(): void {
		if (this.status !== "pending") {
			return;
		}
		this.status = "running";
		this.startTime = performance.now();
		if (debugTask.enabled) {
			debugTask(
				"[%s] starting (%s, %s priority)",
				this.name,
				this.mode,
				this.priority,
			);
		}

		let result: unknown;
		try {
			result = otelContext.with(this.runContext, () =>
				this.operation({
					signal: this.abortController.signal,
					name: this.name,
					key: this.key,
				}),
			);
		} catch (error) {
			this.fail(error);
			return;
		}

		if (isPromiseLike(result)) {
			void Promise.resolve(result).then(
				() => this.complete(),
				(error: unknown) => this.fail(error),
			);
		} else {
			this.complete();
		}
	}

	[Symbol.dispose](): void {
		this.cancel();
	}

	private complete(): void {
		if (!this.isSettled) {
			this.settle("completed", undefined);
		}
	}

	private fail(error: unknown): void {
		if (this.isSettled) {
			return;
		}
		if (this.abortController.signal.aborted) {
			// Rejections after cancellation count as the cancellation itself
			this.settle("cancelled", this.abortController.signal.reason);
		} else {
			this.settle("failed", error);
		}
	}

	private settle(state: TaskSettlement["state"], error: unknown): void {
		this.status = state;
		const durationMs =
			this.startTime === undefined ? 0 : performance.now() - this.startTime;
		if (debugTask.enabled) {
			debugTask(
				"[%s] %s after %dms%s",
				this.name,
				state,
				Math.round(durationMs),
				state === "failed" ? `: ${String(error)}` : "",
			);
		}

		if (this.span) {
			this.span.setAttributes({
				"task.state": state,
				"task.duration_ms": Math.round(durationMs),
			});
			if (state === "failed") {
				this.span.recordException(
					error instanceof Error ? error : new Error(String(error)),
				);
				this.span.setStatus({
					code: SpanStatusCode.ERROR,
					message: "task failed",
				});
			} else if (state === "completed") {
				this.span.setStatus({ code: SpanStatusCode.OK });
			}
			this.span.end();
		}

		this.resolveSettled();
		this.onSettled?.(
			this,
			state === "completed" ? { state, durationMs } : { state, durationMs, error },
		);
	}
}
