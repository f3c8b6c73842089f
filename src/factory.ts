/**
 * Scope factory function
 */

import type { ScopeOptions } from "./scope.js";
import { CancellationScope } from "./scope.js";

/**
 * Create a new, unobserved CancellationScope.
 *
 * @example
 * ```typescript
 * const s = scope({ name: "dashboard" })
 * using _visible = s.observe()
 * s.submit(({ signal }) => poll(signal), { key: "poll" })
 * ```
 *
 * @example With OpenTelemetry tracing
 * ```typescript
 * import { trace } from "@opentelemetry/api"
 *
 * const s = scope({ tracer: trace.getTracer("my-app") })
 * s.activate()
 * s.submit(() => sync(), { name: "sync" }) // creates a "sync" span
 * ```
 */
export function scope(options?: ScopeOptions): CancellationScope {
	return new CancellationScope(options);
}
