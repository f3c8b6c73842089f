import { describe, expect, test, vi } from "vitest";
import {
	globalExecutor,
	inlineExecutor,
	type Job,
	microtaskExecutor,
	PriorityExecutor,
	scope,
	type TaskPriority,
} from "../src/index.js";
import { flushPromises, ManualExecutor } from "../src/testing/index.js";

function job(priority: TaskPriority, log: string[], label: string): Job {
	return {
		priority,
		run: () => {
			log.push(label);
		},
	};
}

describe("PriorityExecutor", () => {
	test("drains highest priority first, FIFO within a lane", () => {
		const log: string[] = [];
		const executor = new PriorityExecutor("test");

		executor.enqueue(job("low", log, "low"));
		executor.enqueue(job("high", log, "high-1"));
		executor.enqueue(job("background", log, "background"));
		executor.enqueue(job("medium", log, "medium"));
		executor.enqueue(job("high", log, "high-2"));
		expect(executor.pending).toBe(5);

		expect(executor.drain()).toBe(5);
		expect(log).toEqual(["high-1", "high-2", "medium", "low", "background"]);
		expect(executor.pending).toBe(0);
	});

	test("jobs queued during a drain wait for the next one", () => {
		const log: string[] = [];
		const executor = new PriorityExecutor("test");

		executor.enqueue({
			priority: "low",
			run: () => {
				log.push("outer");
				executor.enqueue(job("high", log, "inner"));
			},
		});

		expect(executor.drain()).toBe(1);
		expect(log).toEqual(["outer"]);
		expect(executor.pending).toBe(1);

		expect(executor.drain()).toBe(1);
		expect(log).toEqual(["outer", "inner"]);
	});

	test("requests one drain per batch", () => {
		const log: string[] = [];
		const drains: Array<() => void> = [];
		const schedule = vi.fn((drain: () => void) => {
			drains.push(drain);
		});
		const executor = new PriorityExecutor("test", schedule);

		executor.enqueue(job("medium", log, "a"));
		executor.enqueue(job("medium", log, "b"));
		executor.enqueue(job("medium", log, "c"));
		expect(schedule).toHaveBeenCalledTimes(1);

		drains[0]?.();
		expect(log).toEqual(["a", "b", "c"]);

		executor.enqueue(job("medium", log, "d"));
		expect(schedule).toHaveBeenCalledTimes(2);
	});
});

describe("built-in executors", () => {
	test("globalExecutor runs on a later macrotask", async () => {
		const log: string[] = [];

		globalExecutor.enqueue(job("medium", log, "ran"));
		expect(log).toEqual([]);

		await Promise.resolve();
		expect(log).toEqual([]);

		await flushPromises();
		expect(log).toEqual(["ran"]);
	});

	test("microtaskExecutor runs before the next macrotask", async () => {
		const log: string[] = [];

		microtaskExecutor.enqueue(job("medium", log, "ran"));
		expect(log).toEqual([]);

		await Promise.resolve();
		expect(log).toEqual(["ran"]);
	});

	test("inlineExecutor runs inside enqueue", () => {
		const log: string[] = [];

		inlineExecutor.enqueue(job("background", log, "ran"));

		expect(log).toEqual(["ran"]);
	});
});

describe("ManualExecutor", () => {
	test("runNext takes the highest priority job", () => {
		const log: string[] = [];
		const executor = new ManualExecutor();

		executor.enqueue(job("low", log, "low"));
		executor.enqueue(job("high", log, "high"));

		expect(executor.runNext()).toBe(true);
		expect(log).toEqual(["high"]);
		expect(executor.pending).toBe(1);

		expect(executor.runNext()).toBe(true);
		expect(executor.runNext()).toBe(false);
		expect(log).toEqual(["high", "low"]);
	});

	test("runAll includes jobs queued while running", () => {
		const log: string[] = [];
		const executor = new ManualExecutor();

		executor.enqueue({
			priority: "medium",
			run: () => {
				log.push("first");
				executor.enqueue(job("medium", log, "second"));
			},
		});

		expect(executor.runAll()).toBe(2);
		expect(log).toEqual(["first", "second"]);
	});

	test("never drains on its own", async () => {
		const log: string[] = [];
		const executor = new ManualExecutor();

		executor.enqueue(job("high", log, "ran"));
		await flushPromises();

		expect(log).toEqual([]);
		expect(executor.name).toBe("manual");
	});
});

describe("scope priorities", () => {
	test("submitted work runs in priority order", () => {
		const order: string[] = [];
		const executor = new ManualExecutor();
		const s = scope({ executor });

		s.activate();
		s.submit(({ name }) => {
			order.push(name);
		}, { name: "l", priority: "low" });
		s.submit(({ name }) => {
			order.push(name);
		}, { name: "b", priority: "background" });
		s.submit(({ name }) => {
			order.push(name);
		}, { name: "h", priority: "high" });
		s.submit(({ name }) => {
			order.push(name);
		}, { name: "m" });
		executor.runAll();

		expect(order).toEqual(["h", "m", "l", "b"]);
	});
});
