/**
 * Profiler collaborator for scopeline - labelled task execution
 */

import {
	type Context,
	context as otelContext,
	SpanStatusCode,
	type Tracer,
	trace,
} from "@opentelemetry/api";
import { type LabelSet, withLabels } from "./labels.js";

/**
 * Runs a function with a label set attached for the duration of the call.
 *
 * `ctx` already carries the labels of the submitting scope; implementations
 * merge `labels` on top and hand the merged context to `fn`.
 */
export interface Profiler {
	run<T>(
		ctx: Context,
		labels: LabelSet,
		fn: (ctx: Context) => Promise<T>,
	): Promise<T>;
}

/**
 * Default profiler. Makes the labelled context active while `fn` runs and,
 * when a tracer is given, wraps the call in a span whose attributes are the
 * labels.
 *
 * @example
 * ```typescript
 * import { trace } from "@opentelemetry/api"
 *
 * const s = scope({ tracer: trace.getTracer("worker") })
 * goLabelled(s, "sync", "sync accounts", plain(syncAccounts))
 * // span "sync" with label.name=sync, label.description=sync accounts
 * ```
 */
export class TracingProfiler implements Profiler {
	constructor(private readonly tracer?: Tracer) {}

	async run<T>(
		ctx: Context,
		labels: LabelSet,
		fn: (ctx: Context) => Promise<T>,
	): Promise<T> {
		const labelled = withLabels(ctx, labels);
		if (!this.tracer) {
			return otelContext.with(labelled, () => fn(labelled));
		}

		const attributes: Record<string, string> = {};
		for (const { key, value } of labels) {
			attributes[`label.${key}`] = value;
		}
		const spanName =
			labels.find((label) => label.key === "name")?.value ?? "scope.task";
		const span = this.tracer.startSpan(spanName, { attributes }, labelled);
		const active = trace.setSpan(labelled, span);

		try {
			const result = await otelContext.with(active, () => fn(active));
			span.setStatus({ code: SpanStatusCode.OK });
			return result;
		} catch (error) {
			span.recordException(
				error instanceof Error ? error : new Error(String(error)),
			);
			span.setStatus({ code: SpanStatusCode.ERROR, message: "task failed" });
			throw error;
		} finally {
			span.end();
		}
	}
}
