/**
 * Label sets for profiler attribution
 *
 * Labels travel as OpenTelemetry baggage on an explicitly passed context.
 * Nothing is stored globally: a label set only applies to the call it is
 * handed to.
 */

import { type Context, propagation } from "@opentelemetry/api";
import { type ContextError, MisuseError } from "./errors.js";
import type { CancelContext } from "./types.js";

/**
 * One string key/value pair.
 */
export interface Label {
	readonly key: string;
	readonly value: string;
}

/**
 * An ordered, immutable collection of labels.
 */
export type LabelSet = readonly Label[];

/**
 * Build a label set from alternating keys and values.
 *
 * @throws MisuseError when given an odd number of strings
 *
 * @example
 * ```typescript
 * labels("region", "eu-west", "shard", "7")
 * // [{ key: "region", value: "eu-west" }, { key: "shard", value: "7" }]
 * ```
 */
export function labels(...pairs: string[]): LabelSet {
	if (pairs.length % 2 !== 0) {
		throw new MisuseError(
			`labels expects key/value pairs, got ${pairs.length} strings`,
		);
	}
	const out: Label[] = [];
	for (let i = 0; i < pairs.length; i += 2) {
		const key = pairs[i];
		const value = pairs[i + 1];
		if (key !== undefined && value !== undefined) {
			out.push({ key, value });
		}
	}
	return Object.freeze(out);
}

/**
 * The label set of a named task: `name` and `description` first, then any
 * extra key/value pairs.
 */
export function taskLabels(
	name: string,
	description: string,
	...extra: string[]
): LabelSet {
	return labels("name", name, "description", description, ...extra);
}

/**
 * Returns a copy of `ctx` whose baggage also carries `set`. Later labels
 * replace earlier ones with the same key, keeping their position.
 */
export function withLabels(ctx: Context, set: LabelSet): Context {
	let baggage = propagation.getBaggage(ctx) ?? propagation.createBaggage();
	for (const { key, value } of set) {
		baggage = baggage.setEntry(key, { value });
	}
	return propagation.setBaggage(ctx, baggage);
}

/**
 * Reads the labels carried by `ctx`, in insertion order.
 */
export function labelsFromContext(ctx: Context): LabelSet {
	const baggage = propagation.getBaggage(ctx);
	if (!baggage) {
		return Object.freeze([]);
	}
	return Object.freeze(
		baggage
			.getAllEntries()
			.map(([key, entry]) => ({ key, value: entry.value })),
	);
}

/**
 * A CancelContext that behaves exactly like `inner` but carries extra labels.
 * Cancellation is untouched.
 */
export class LabelledContext implements CancelContext {
	readonly telemetry: Context;

	constructor(
		private readonly inner: CancelContext,
		set: LabelSet,
	) {
		this.telemetry = withLabels(inner.telemetry, set);
	}

	get signal(): AbortSignal {
		return this.inner.signal;
	}

	deadline(): Date | undefined {
		return this.inner.deadline();
	}

	err(): ContextError | undefined {
		return this.inner.err();
	}

	cause(): unknown {
		return this.inner.cause();
	}
}
