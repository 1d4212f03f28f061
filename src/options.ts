/**
 * Scope options for scopeline
 *
 * An option takes a scope and returns the scope to use from then on, which
 * may be a derived child. Options apply strictly in the order given.
 */

import { withDeadline, withSignals, withTimeout } from "./derive.js";
import type { Health } from "./health.js";
import { LabelledContext, type LabelSet } from "./labels.js";
import type { Scope } from "./scope.js";

export type ScopeOption = (scope: Scope) => Scope;

/**
 * Apply `options` to `scope` in order, each one receiving the previous result.
 */
export function applyOptions(
	scope: Scope,
	options: Iterable<ScopeOption>,
): Scope {
	let out = scope;
	for (const option of options) {
		out = option(out);
	}
	return out;
}

/**
 * Derive a child that times out after `ms`.
 *
 * @example
 * ```typescript
 * const s = scope({ derive: [timeoutAfter(5000)] })
 * ```
 */
export function timeoutAfter(ms: number, cause?: unknown): ScopeOption {
	return (scope) => withTimeout(scope, ms, cause)[0];
}

/**
 * Derive a child that closes at `at`.
 */
export function deadlineAt(at: Date, cause?: unknown): ScopeOption {
	return (scope) => withDeadline(scope, at, cause)[0];
}

/**
 * Derive a child that closes when one of `signals` arrives.
 */
export function cancelOnSignals(...signals: NodeJS.Signals[]): ScopeOption {
	return (scope) => withSignals(scope, ...signals)[0];
}

/**
 * Attach `set` to the scope's context. Cancellation is unchanged.
 */
export function labelled(set: LabelSet): ScopeOption {
	return (scope) => {
		scope.replaceUnderlying((ctx) => new LabelledContext(ctx, set));
		return scope;
	};
}

/**
 * Write `entries` into the shared value store.
 */
export function seededWith(
	entries: Iterable<readonly [unknown, unknown]>,
): ScopeOption {
	return (scope) => {
		for (const [key, value] of entries) {
			scope.set(key, value);
		}
		return scope;
	};
}

/**
 * Push `fn` onto the cleanup chain.
 *
 * Cleanups run after the scope's done-signal has aborted, not before it, so
 * `fn` already sees `err() !== undefined`. Teardown that has to happen while
 * the scope is still open belongs in the task itself.
 */
export function onCancel(fn: () => void): ScopeOption {
	return (scope) => {
		scope.pushCleanup(fn);
		return scope;
	};
}

/**
 * Like {@link onCancel}; `fn` receives the frozen cause.
 */
export function onCancelCause(fn: (cause: unknown) => void): ScopeOption {
	return (scope) => {
		scope.pushCleanupWithCause(fn);
		return scope;
	};
}

/**
 * Mark `name` alive in `health` until the scope closes.
 */
export function reportsTo(health: Health, name: string): ScopeOption {
	return (scope) => {
		const item = health.start(name);
		scope.pushCleanup(() => item.stop());
		return scope;
	};
}

/**
 * Bundle several options into one.
 */
export function compose(...options: ScopeOption[]): ScopeOption {
	return (scope) => applyOptions(scope, options);
}
