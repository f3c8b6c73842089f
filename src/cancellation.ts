/**
 * Cooperative cancellation helpers
 *
 * The scope only requests cancellation; submitted work decides where to
 * stop. These helpers give it checkpoints built on the task's AbortSignal.
 */

import createDebug from "debug";
import { TaskCancelledError } from "./errors.js";

const debugCancel = createDebug("visibility-scope:cancellation");

/**
 * Throws the abort reason if the signal is aborted.
 *
 * @example
 * ```typescript
 * s.submit(async ({ signal }) => {
 *   for (const page of pages) {
 *     throwIfCancelled(signal)
 *     await upload(page)
 *   }
 * })
 * ```
 */
export function throwIfCancelled(signal: AbortSignal): void {
	if (signal.aborted) {
		throw signal.reason;
	}
}

/**
 * Whether `error` is a cancellation rather than a failure: a
 * TaskCancelledError or a DOM-style AbortError (as thrown by fetch).
 */
export function isCancellation(error: unknown): boolean {
	if (error instanceof TaskCancelledError) {
		return true;
	}
	return error instanceof Error && error.name === "AbortError";
}

/**
 * Registers a callback for when the signal aborts. Runs it right away if
 * the signal already has. Disposing the result unregisters it.
 *
 * @example
 * ```typescript
 * s.submit(async ({ signal }) => {
 *   const socket = connect()
 *   using _close = onCancel(signal, () => socket.close())
 *   await socket.closed
 * })
 * ```
 */
export function onCancel(
	signal: AbortSignal,
	callback: (reason: unknown) => void,
): Disposable {
	if (signal.aborted) {
		callback(signal.reason);
		return { [Symbol.dispose]: () => {} };
	}

	const handler = (): void => {
		if (debugCancel.enabled) {
			debugCancel("cancel callback invoked: %s", signal.reason);
		}
		callback(signal.reason);
	};
	signal.addEventListener("abort", handler, { once: true });

	return {
		[Symbol.dispose]: () => {
			signal.removeEventListener("abort", handler);
		},
	};
}

/**
 * Resolves after `ms` milliseconds, or rejects with the abort reason as
 * soon as the signal aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timeoutId);
			reject(signal.reason);
		};
		const timeoutId = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Yields to the event loop once, then throws if the signal aborted in the
 * meantime. Use it inside long synchronous loops so cancellation can land.
 *
 * @example
 * ```typescript
 * s.submit(async ({ signal }) => {
 *   for (let i = 0; i < rows.length; i++) {
 *     if (i % 500 === 0) await checkpoint(signal)
 *     index(rows[i])
 *   }
 * })
 * ```
 */
export async function checkpoint(signal: AbortSignal): Promise<void> {
	throwIfCancelled(signal);
	await new Promise<void>((resolve) => {
		setImmediate(resolve);
	});
	throwIfCancelled(signal);
}

/**
 * Resolves with the abort reason once the signal aborts.
 */
export function whenCancelled(signal: AbortSignal): Promise<unknown> {
	if (signal.aborted) {
		return Promise.resolve(signal.reason);
	}
	return new Promise((resolve) => {
		signal.addEventListener(
			"abort",
			() => {
				resolve(signal.reason);
			},
			{ once: true },
		);
	});
}
