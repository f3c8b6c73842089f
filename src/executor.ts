/**
 * Executors for visibility-scope
 *
 * An executor decides where and when dispatched work runs. The scope only
 * hands it jobs; cancellation stays with the task handle.
 */

import createDebug from "debug";
import type { Executor, Job, TaskPriority } from "./types.js";
import { TASK_PRIORITIES } from "./types.js";

const debugExecutor = createDebug("visibility-scope:executor");

/**
 * Requests a single future call of `drain`.
 */
export type DrainScheduler = (drain: () => void) => void;

/**
 * Executor with one FIFO lane per priority.
 *
 * The first job queued after a drain schedules the next drain. A drain runs
 * the jobs that were queued when it started, highest priority first; jobs
 * queued while it runs wait for the following drain.
 *
 * @example
 * ```typescript
 * const frameExecutor = new PriorityExecutor("frame", (drain) => {
 *   requestAnimationFrame(drain)
 * })
 * const s = scope({ executor: frameExecutor })
 * ```
 */
export class PriorityExecutor implements Executor {
	readonly name: string;
	private readonly lanes: Record<TaskPriority, Job[]> = {
		high: [],
		medium: [],
		low: [],
		background: [],
	};
	private queued = 0;
	private drainRequested = false;
	private readonly schedule: DrainScheduler | undefined;

	/**
	 * @param schedule - How to request a drain. Without one, jobs only run
	 *   when `drain()` is called.
	 */
	constructor(name: string, schedule?: DrainScheduler) {
		this.name = name;
		this.schedule = schedule;
	}

	/**
	 * Number of jobs waiting to run.
	 */
	get pending(): number {
		return this.queued;
	}

	enqueue(job: Job): void {
		this.lanes[job.priority].push(job);
		this.queued++;
		if (debugExecutor.enabled) {
			debugExecutor(
				"[%s] queued %s job (pending: %d)",
				this.name,
				job.priority,
				this.queued,
			);
		}
		if (this.schedule && !this.drainRequested) {
			this.drainRequested = true;
			this.schedule(() => {
				this.drain();
			});
		}
	}

	/**
	 * Run every job queued so far, highest priority first.
	 * @returns The number of jobs run
	 */
	drain(): number {
		this.drainRequested = false;
		const batch: Job[] = [];
		for (const priority of TASK_PRIORITIES) {
			batch.push(...this.lanes[priority].splice(0));
		}
		this.queued -= batch.length;
		if (debugExecutor.enabled && batch.length > 0) {
			debugExecutor("[%s] draining %d jobs", this.name, batch.length);
		}
		for (const job of batch) {
			job.run();
		}
		return batch.length;
	}

	/**
	 * Remove and return the highest priority job, if any.
	 */
	protected takeNext(): Job | undefined {
		for (const priority of TASK_PRIORITIES) {
			const job = this.lanes[priority].shift();
			if (job) {
				this.queued--;
				return job;
			}
		}
		return undefined;
	}
}

/**
 * Default executor. Drains on the next macrotask (`setImmediate`), so work
 * never runs on the stack of the code that submitted it.
 */
export const globalExecutor: Executor = new PriorityExecutor(
	"global",
	(drain) => {
		setImmediate(drain);
	},
);

/**
 * Drains on the microtask queue: after the current synchronous code, before
 * timers and I/O.
 */
export const microtaskExecutor: Executor = new PriorityExecutor(
	"microtask",
	(drain) => {
		queueMicrotask(drain);
	},
);

/**
 * Runs each job synchronously inside `enqueue`, on the submitter's stack.
 */
export const inlineExecutor: Executor = {
	name: "inline",
	enqueue(job: Job): void {
		job.run();
	},
};
