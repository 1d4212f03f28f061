/**
 * Scope derivation for scopeline
 *
 * Every function here builds a child scope with its own cancellation that
 * shares the parent's task group and value store. The child closes on its own
 * trigger or when the parent closes, whichever comes first.
 */

import { CancelNode } from "./context.js";
import { MisuseError, SignalReceivedError } from "./errors.js";
import type { Scope } from "./scope.js";
import { DEFAULT_SIGNALS } from "./signals.js";
import type { CancelCauseFunc, CancelFunc } from "./types.js";

/**
 * A child scope whose cancel function records a cause.
 *
 * @example
 * ```typescript
 * const [child, cancel] = withCancelCause(s)
 * cancel(new Error("upstream closed"))
 * child.cause() // Error: upstream closed
 * s.err()       // undefined, the parent stays open
 * ```
 */
export function withCancelCause(parent: Scope): [Scope, CancelCauseFunc] {
	const node = new CancelNode(parent);
	const child = parent.deriveFrom(node, node.cancel);
	return [child, (cause?: unknown) => child.cancelWithCause(cause)];
}

/**
 * A child scope with its own cancel function.
 */
export function withCancel(parent: Scope): [Scope, CancelFunc] {
	const [child] = withCancelCause(parent);
	return [child, () => child.cancel()];
}

/**
 * A child scope that closes with `DeadlineExceeded` at `at`.
 * When the deadline elapses the cause is `cause`, if given.
 * A deadline later than the parent's adds nothing but a cancel function.
 */
export function withDeadline(
	parent: Scope,
	at: Date,
	cause?: unknown,
): [Scope, CancelFunc] {
	const node = new CancelNode(parent, { deadline: at, deadlineCause: cause });
	const child = parent.deriveFrom(node, node.cancel);
	return [child, () => child.cancel()];
}

/**
 * `withDeadline(parent, now + ms, cause)`.
 *
 * @throws MisuseError when `ms` is negative or not a finite number
 */
export function withTimeout(
	parent: Scope,
	ms: number,
	cause?: unknown,
): [Scope, CancelFunc] {
	if (!Number.isFinite(ms) || ms < 0) {
		throw new MisuseError(`timeout must be a non-negative number, got ${ms}`);
	}
	return withDeadline(parent, new Date(Date.now() + ms), cause);
}

/**
 * A child scope that closes when one of `signals` arrives (SIGTERM and
 * SIGINT when none are given). The cause is a SignalReceivedError.
 *
 * Signals come from the scope's signal source. The listener is released as
 * soon as the child closes, whatever closed it.
 */
export function withSignals(
	parent: Scope,
	...signals: NodeJS.Signals[]
): [Scope, CancelFunc] {
	const subscription = parent.signalSource.notify(
		signals.length > 0 ? signals : DEFAULT_SIGNALS,
	);
	const node = new CancelNode(parent);

	const onSignal = () => {
		node.cancel(new SignalReceivedError(subscription.received() ?? "unknown"));
	};
	if (subscription.signal.aborted) {
		onSignal();
	} else {
		subscription.signal.addEventListener("abort", onSignal, { once: true });
	}

	const child = parent.deriveFrom(node, node.cancel);
	child.pushCleanup(() => {
		subscription.signal.removeEventListener("abort", onSignal);
		subscription.stop();
	});
	return [child, () => child.cancel()];
}
