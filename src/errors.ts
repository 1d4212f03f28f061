/**
 * Built-in error classes for scopeline
 */

/**
 * CanceledError - terminal status of a scope closed by an explicit cancel
 * or by its parent.
 *
 * `err()` only ever returns the {@link Canceled} singleton, so identity
 * comparison works:
 *
 * @example
 * ```typescript
 * s.cancel()
 * s.err() === Canceled // true
 * ```
 */
export class CanceledError extends Error {
	readonly _tag = "CanceledError" as const;

	constructor() {
		super("context canceled");
		this.name = "CanceledError";
	}
}

/**
 * DeadlineExceededError - terminal status of a scope whose deadline elapsed.
 * Reported by `err()` even when a custom cause was configured.
 */
export class DeadlineExceededError extends Error {
	readonly _tag = "DeadlineExceededError" as const;

	constructor() {
		super("context deadline exceeded");
		this.name = "DeadlineExceededError";
	}
}

export const Canceled: CanceledError = new CanceledError();
export const DeadlineExceeded: DeadlineExceededError =
	new DeadlineExceededError();

/**
 * Terminal statuses a closed context can report.
 */
export type ContextError = CanceledError | DeadlineExceededError;

/**
 * MisuseError - a programming defect, such as dispatching an unset task
 * function. Thrown synchronously from the offending call, never captured
 * by a task group.
 */
export class MisuseError extends Error {
	readonly _tag = "MisuseError" as const;

	constructor(message: string) {
		super(message);
		this.name = "MisuseError";
	}
}

/**
 * SignalReceivedError - cause recorded when a signal-triggered scope is
 * cancelled by a process signal.
 */
export class SignalReceivedError extends Error {
	readonly _tag = "SignalReceivedError" as const;
	readonly signal: string;

	constructor(signal: string) {
		super(`received signal ${signal}`);
		this.name = "SignalReceivedError";
		this.signal = signal;
	}
}

/**
 * UnknownError - wraps task failures that were not `Error` instances.
 * The thrown value is kept as `cause`.
 *
 * @example
 * ```typescript
 * s.go(() => Promise.reject("boom"))
 * const err = await s.wait()
 * err instanceof UnknownError // true, err.cause === "boom"
 * ```
 */
export class UnknownError extends Error {
	readonly _tag = "UnknownError" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "UnknownError";
	}
}

/**
 * Normalize a thrown value into an Error without re-wrapping real errors.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) {
		return value;
	}
	return new UnknownError(
		typeof value === "string" ? value : `non-error thrown: ${String(value)}`,
		{ cause: value },
	);
}
