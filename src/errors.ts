/**
 * Built-in error classes for visibility-scope
 */

import type { CancelReason } from "./types.js";

/**
 * ObserverCountError - deactivate() was called more often than activate().
 *
 * Raised when the observer count would drop below zero. The scope clamps the
 * count to zero and reports the error through `hooks.onViolation` and the
 * logger; a `strict` scope also throws it.
 *
 * @example
 * ```typescript
 * const s = scope({ strict: true })
 * s.deactivate() // throws ObserverCountError
 * ```
 */
export class ObserverCountError extends Error {
	readonly _tag = "ObserverCountError" as const;
	/** The count the failed transition would have produced */
	readonly observerCount: number;
	readonly scopeName: string;

	constructor(scopeName: string, observerCount: number) {
		super(
			`observer count of scope "${scopeName}" dropped below zero (${observerCount}); deactivate() calls outnumber activate() calls`,
		);
		this.name = "ObserverCountError";
		this.scopeName = scopeName;
		this.observerCount = observerCount;
	}
}

/**
 * TaskCancelledError - abort reason placed on a task's signal.
 *
 * Work that rejects with its own signal's reason ends up `cancelled` rather
 * than `failed`.
 *
 * @example
 * ```typescript
 * s.submit(async ({ signal }) => {
 *   await sleep(1000, signal)
 * })
 * s.deactivate() // signal.reason is TaskCancelledError { reason: "deactivated" }
 * ```
 */
export class TaskCancelledError extends Error {
	readonly _tag = "TaskCancelledError" as const;
	readonly reason: CancelReason;

	constructor(reason: CancelReason, taskName?: string) {
		super(
			taskName === undefined
				? `task ${reason}`
				: `task "${taskName}" ${reason}`,
		);
		this.name = "TaskCancelledError";
		this.reason = reason;
	}
}
