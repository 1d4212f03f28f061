/**
 * Scope factory functions
 */

import type { Tracer } from "@opentelemetry/api";
import createDebug from "debug";
import { background, CancelNode, fromSignal } from "./context.js";
import { resolveLogger } from "./logger.js";
import { applyOptions, type ScopeOption } from "./options.js";
import { type Profiler, TracingProfiler } from "./profiler.js";
import { Scope, type ScopeRuntime } from "./scope.js";
import { processSignals, type SignalSource } from "./signals.js";
import { TaskGroup } from "./task-group.js";
import type { CancelContext, ScopeLoggingOptions } from "./types.js";
import { ConditionalRunner, ValueStore } from "./values.js";

const debugScope = createDebug("scopeline:scope");

let rootIdCounter = 0;

/**
 * Options for creating a root Scope
 */
export interface ScopeOptions extends ScopeLoggingOptions {
	/**
	 * Name used in logs and debug output. Defaults to "scope-<n>".
	 */
	name?: string;
	/**
	 * Optional parent context. The scope closes when the parent closes.
	 */
	parent?: CancelContext;
	/**
	 * Optional AbortSignal to link cancellation, used when no parent is given.
	 */
	signal?: AbortSignal;
	/**
	 * Optional OpenTelemetry tracer. Labelled tasks get a span each.
	 * Ignored when a profiler is given.
	 */
	tracer?: Tracer;
	/**
	 * Profiler that runs labelled tasks. Defaults to a TracingProfiler.
	 */
	profiler?: Profiler;
	/**
	 * Where signal-triggered scopes get their signals. Defaults to the process.
	 */
	signals?: SignalSource;
	/**
	 * Initial entries of the value store.
	 */
	values?: Iterable<readonly [unknown, unknown]>;
	/**
	 * Options applied in order to the freshly built scope.
	 */
	derive?: readonly ScopeOption[];
}

/**
 * Create a new root Scope for structured concurrency.
 *
 * @param options - Optional configuration for the scope
 * @returns The root scope, or the scope the last `derive` option returned
 *
 * @example
 * ```typescript
 * const s = scope({ derive: [timeoutAfter(5000)] })
 * s.go(() => fetchData(s.signal))
 * const err = await s.wait()
 * ```
 *
 * @example With OpenTelemetry tracing
 * ```typescript
 * import { trace } from "@opentelemetry/api"
 *
 * const s = scope({ tracer: trace.getTracer("my-app") })
 * goLabelled(s, "fetch", "fetch data", plain(fetchData))
 * ```
 */
export function scope(options?: ScopeOptions): Scope {
	const name = options?.name ?? `scope-${++rootIdCounter}`;
	const parent =
		options?.parent ??
		(options?.signal ? fromSignal(options.signal) : background());

	// The base node takes explicit cancels; the group node below it is the
	// one the task group closes, so a failure closes everything under the root.
	const base = new CancelNode(parent);
	const groupNode = new CancelNode(base);
	// Once the group closes, base has nothing left to propagate to; closing it
	// detaches it from a long-lived parent.
	groupNode.signal.addEventListener(
		"abort",
		() => base.cancel(groupNode.cause()),
		{ once: true },
	);
	const values = new ValueStore(options?.values);

	const runtime: ScopeRuntime = {
		name,
		group: new TaskGroup(groupNode.cancel, name),
		values,
		flags: new ConditionalRunner(values),
		profiler: options?.profiler ?? new TracingProfiler(options?.tracer),
		signals: options?.signals ?? processSignals,
		logger: resolveLogger(options),
	};

	if (debugScope.enabled) {
		debugScope(
			"[%s] creating root scope (parent: %s, options: %d)",
			name,
			options?.parent ? "context" : options?.signal ? "signal" : "none",
			options?.derive?.length ?? 0,
		);
	}

	const root = new Scope(groupNode, base.cancel, runtime);
	return applyOptions(root, options?.derive ?? []);
}

/**
 * Create a root Scope under `parent` and apply `options` in order.
 */
export function scopeFrom(
	parent: CancelContext,
	...options: ScopeOption[]
): Scope {
	return scope({ parent, derive: options });
}

/**
 * A root Scope with default options, under the background context.
 */
export function backgroundScope(): Scope {
	return scope();
}
