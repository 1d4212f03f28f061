/**
 * Cancellation helpers for CancelContext
 *
 * Cancellation is cooperative: a task only stops when it checks its context.
 * These helpers cover the usual ways of checking.
 */

import createDebug from "debug";
import { Canceled, type ContextError } from "./errors.js";
import type { CancelContext } from "./types.js";

const debugCancel = createDebug("scopeline:cancellation");

/**
 * Throws the context's terminal status if it is closed.
 *
 * @throws `Canceled` or `DeadlineExceeded`
 *
 * @example
 * ```typescript
 * s.go(async () => {
 *   for (const item of items) {
 *     throwIfDone(s)  // stop between items once the scope is cancelled
 *     await handle(item)
 *   }
 * })
 * ```
 */
export function throwIfDone(ctx: CancelContext): void {
	const err = ctx.err();
	if (err) {
		throw err;
	}
}

/**
 * Registers a callback to be invoked with the cause when the context closes.
 * Returns a disposable that can be used to unregister the callback.
 *
 * The callback runs immediately if the context is already closed.
 *
 * @example
 * ```typescript
 * using _watch = onDone(s, (cause) => {
 *   console.log("stopping:", cause)
 * })
 * ```
 */
export function onDone(
	ctx: CancelContext,
	callback: (cause: unknown) => void,
): Disposable {
	const signal = ctx.signal;
	if (signal.aborted) {
		if (debugCancel.enabled) {
			debugCancel("context already closed, calling callback immediately");
		}
		callback(ctx.cause());
		return {
			[Symbol.dispose]: () => {},
		};
	}

	let disposed = false;

	const handler = () => {
		if (disposed) return;
		disposed = true;
		callback(ctx.cause());
	};

	signal.addEventListener("abort", handler, { once: true });

	return {
		[Symbol.dispose]: () => {
			if (!disposed) {
				disposed = true;
				signal.removeEventListener("abort", handler);
				if (debugCancel.enabled) {
					debugCancel("done callback unregistered");
				}
			}
		},
	};
}

/**
 * Resolves with the terminal status once the context closes.
 * Resolves immediately if already closed.
 *
 * @example
 * ```typescript
 * s.go(async () => {
 *   const status = await whenDone(s)  // Canceled or DeadlineExceeded
 *   throw status
 * })
 * ```
 */
export function whenDone(ctx: CancelContext): Promise<ContextError> {
	const current = ctx.err();
	if (current) {
		return Promise.resolve(current);
	}

	return new Promise((resolve) => {
		ctx.signal.addEventListener(
			"abort",
			() => {
				resolve(ctx.err() ?? Canceled);
			},
			{ once: true },
		);
	});
}

/**
 * Waits `ms` milliseconds unless the context closes first, in which case the
 * promise rejects with the context's terminal status.
 */
export function sleep(ctx: CancelContext, ms: number): Promise<void> {
	return new Promise((resolve, reject) => {
		const current = ctx.err();
		if (current) {
			reject(current);
			return;
		}

		const onAbort = () => {
			clearTimeout(timeoutId);
			reject(ctx.err() ?? Canceled);
		};
		const timeoutId = setTimeout(() => {
			ctx.signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		ctx.signal.addEventListener("abort", onAbort, { once: true });
	});
}
