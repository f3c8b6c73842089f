import {
	context,
	createContextKey,
	SpanStatusCode,
	trace,
} from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import {
	BasicTracerProvider,
	InMemorySpanExporter,
	SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { scope, sleep } from "../src/index.js";
import { flushPromises, ManualExecutor } from "../src/testing/index.js";

const REQUEST_ID = createContextKey("request-id");

describe("tracing", () => {
	let exporter: InMemorySpanExporter;
	let provider: BasicTracerProvider;

	beforeEach(() => {
		exporter = new InMemorySpanExporter();
		provider = new BasicTracerProvider({
			spanProcessors: [new SimpleSpanProcessor(exporter)],
		});
		context.setGlobalContextManager(
			new AsyncLocalStorageContextManager().enable(),
		);
	});

	afterEach(async () => {
		context.disable();
		await provider.shutdown();
	});

	async function finishedSpans() {
		await provider.forceFlush();
		return exporter.getFinishedSpans();
	}

	test("creates a span per task with its attributes", async () => {
		const s = scope({ name: "search-screen", tracer: provider.getTracer("test") });

		s.activate();
		s.submit(() => {}, { name: "search", key: "query", mode: "immediate" });

		const spans = await finishedSpans();
		expect(spans).toHaveLength(1);
		const span = spans[0];
		expect(span?.name).toBe("search");
		expect(span?.attributes).toMatchObject({
			"task.mode": "immediate",
			"task.priority": "medium",
			"task.keyed": true,
			"task.key": "query",
			"scope.name": "search-screen",
			"task.state": "completed",
		});
		expect(span?.status.code).toBe(SpanStatusCode.OK);
	});

	test("unnamed tasks use a generic span name", async () => {
		const s = scope({ tracer: provider.getTracer("test") });

		s.activate();
		s.submit(() => {}, { mode: "immediate" });

		const spans = await finishedSpans();
		expect(spans[0]?.name).toBe("scope.task");
		expect(spans[0]?.attributes["task.keyed"]).toBe(false);
		expect(spans[0]?.attributes).not.toHaveProperty("task.key");
	});

	test("records failures", async () => {
		const s = scope({ tracer: provider.getTracer("test") });

		s.activate();
		s.submit(() => Promise.reject(new Error("upstream 500")), {
			name: "fetch",
			mode: "immediate",
		});
		await flushPromises();

		const spans = await finishedSpans();
		const span = spans[0];
		expect(span?.attributes["task.state"]).toBe("failed");
		expect(span?.status).toEqual({
			code: SpanStatusCode.ERROR,
			message: "task failed",
		});
		expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
	});

	test("records cancellation as an event", async () => {
		const s = scope({ tracer: provider.getTracer("test") });

		s.activate();
		s.submit(
			async ({ signal }) => {
				await sleep(60_000, signal);
			},
			{ name: "poll", mode: "immediate" },
		);
		s.deactivate();
		await flushPromises();

		const spans = await finishedSpans();
		const span = spans[0];
		expect(span?.attributes["task.state"]).toBe("cancelled");
		expect(span?.events).toHaveLength(1);
		expect(span?.events[0]?.name).toBe("task.cancelled");
		expect(span?.events[0]?.attributes).toEqual({
			"task.cancel_reason": "deactivated",
			"task.started": true,
		});
	});

	test("a task cancelled before it starts still ends its span", async () => {
		const executor = new ManualExecutor();
		const s = scope({ executor, tracer: provider.getTracer("test") });

		s.activate();
		s.submit(() => {}, { name: "stale", key: "k" });
		s.submit(() => {}, { name: "fresh", key: "k" });

		const spans = await finishedSpans();
		expect(spans.map((span) => span.name)).toEqual(["stale"]);
		expect(spans[0]?.events[0]?.attributes).toEqual({
			"task.cancel_reason": "superseded",
			"task.started": false,
		});
	});

	test("normal tasks join the submitter's trace, detached ones start their own", async () => {
		const tracer = provider.getTracer("test");
		const executor = new ManualExecutor();
		const s = scope({ executor, tracer });

		s.activate();
		const request = tracer.startSpan("request");
		context.with(trace.setSpan(context.active(), request), () => {
			s.submit(() => {}, { name: "child" });
			s.submit(() => {}, { name: "background", mode: "detached" });
		});
		request.end();
		executor.runAll();

		const spans = await finishedSpans();
		const traceId = request.spanContext().traceId;
		const child = spans.find((span) => span.name === "child");
		const detached = spans.find((span) => span.name === "background");
		expect(child?.spanContext().traceId).toBe(traceId);
		expect(detached?.spanContext().traceId).not.toBe(traceId);
	});

	test("immediate detached tasks start synchronously in their own trace", async () => {
		const tracer = provider.getTracer("test");
		const s = scope({ tracer });
		const request = tracer.startSpan("request");
		const started: string[] = [];

		s.activate();
		context.with(trace.setSpan(context.active(), request), () => {
			s.submit(
				({ name }) => {
					started.push(name);
				},
				{ name: "audit", mode: "immediate-detached" },
			);
			expect(started).toEqual(["audit"]);
		});
		request.end();

		const spans = await finishedSpans();
		const audit = spans.find((span) => span.name === "audit");
		expect(audit?.attributes["task.mode"]).toBe("immediate-detached");
		expect(audit?.spanContext().traceId).not.toBe(
			request.spanContext().traceId,
		);
	});

	test("the task's span is active while its operation runs", async () => {
		const executor = new ManualExecutor();
		const s = scope({ executor, tracer: provider.getTracer("test") });
		let activeSpanId: string | undefined;

		s.activate();
		s.submit(
			() => {
				activeSpanId = trace.getActiveSpan()?.spanContext().spanId;
			},
			{ name: "work" },
		);
		executor.runAll();

		const spans = await finishedSpans();
		expect(activeSpanId).toBe(spans[0]?.spanContext().spanId);
	});
});

describe("context propagation", () => {
	beforeEach(() => {
		context.setGlobalContextManager(
			new AsyncLocalStorageContextManager().enable(),
		);
	});

	afterEach(() => {
		context.disable();
	});

	test("normal tasks see the submitter's context, detached tasks the root", () => {
		const executor = new ManualExecutor();
		const s = scope({ executor });
		const seen: Record<string, unknown> = {};

		s.activate();
		context.with(context.active().setValue(REQUEST_ID, "req-1"), () => {
			s.submit(
				({ name }) => {
					seen[name] = context.active().getValue(REQUEST_ID);
				},
				{ name: "normal" },
			);
			s.submit(
				({ name }) => {
					seen[name] = context.active().getValue(REQUEST_ID);
				},
				{ name: "detached", mode: "detached" },
			);
		});
		executor.runAll();

		expect(seen).toEqual({ normal: "req-1", detached: undefined });
	});

	test("immediate detached tasks see the root context", () => {
		const s = scope();
		const seen: Record<string, unknown> = {};

		s.activate();
		context.with(context.active().setValue(REQUEST_ID, "req-2"), () => {
			s.submit(
				({ name }) => {
					seen[name] = context.active().getValue(REQUEST_ID);
				},
				{ name: "immediate", mode: "immediate" },
			);
			s.submit(
				({ name }) => {
					seen[name] = context.active().getValue(REQUEST_ID);
				},
				{ name: "immediate-detached", mode: "immediate-detached" },
			);
		});

		expect(seen).toEqual({ immediate: "req-2", "immediate-detached": undefined });
		expect(Object.keys(seen)).toEqual(["immediate", "immediate-detached"]);
	});
});
