/**
 * Cancellation contexts for scopeline
 *
 * A CancelNode is the primitive every scope wraps: an AbortController with a
 * set-once terminal status, a set-once cause, an optional deadline and a link
 * to its parent context.
 */

import { type Context, ROOT_CONTEXT } from "@opentelemetry/api";
import createDebug from "debug";
import {
	Canceled,
	type ContextError,
	DeadlineExceeded,
	MisuseError,
} from "./errors.js";
import type { CancelContext } from "./types.js";

const debugContext = createDebug("scopeline:context");

/** setTimeout cannot wait longer than this; longer deadlines are re-armed. */
const MAX_TIMER_DELAY = 2_147_483_647;

let nodeIdCounter = 0;

const BACKGROUND: CancelContext = Object.freeze({
	signal: new AbortController().signal,
	telemetry: ROOT_CONTEXT,
	deadline: () => undefined,
	err: () => undefined,
	cause: () => undefined,
});

/**
 * The root context. It is never cancelled and has no deadline.
 */
export function background(): CancelContext {
	return BACKGROUND;
}

/**
 * Adapt a plain AbortSignal into a CancelContext.
 * Once the signal aborts, `err()` reports `Canceled` and `cause()` the
 * signal's reason.
 *
 * @example
 * ```typescript
 * const controller = new AbortController()
 * const s = scope({ parent: fromSignal(controller.signal) })
 * controller.abort(new Error("shutdown"))
 * s.cause() // Error: shutdown
 * ```
 */
export function fromSignal(
	signal: AbortSignal,
	telemetry: Context = ROOT_CONTEXT,
): CancelContext {
	return {
		signal,
		telemetry,
		deadline: () => undefined,
		err: () => (signal.aborted ? Canceled : undefined),
		cause: (): unknown => (signal.aborted ? signal.reason : undefined),
	};
}

/**
 * Options for a CancelNode.
 */
export interface CancelNodeOptions {
	/** Close with `DeadlineExceeded` once this instant passes. */
	deadline?: Date;
	/** Cause recorded when the deadline elapses. Defaults to `DeadlineExceeded`. */
	deadlineCause?: unknown;
}

/**
 * A cancellable child of another context.
 *
 * It closes when `cancel` is called, when its deadline elapses or when the
 * parent closes, whichever happens first. Closing freezes the status and the
 * cause, clears the timer and detaches the node from its parent.
 */
export class CancelNode implements CancelContext {
	readonly id: number;
	private readonly controller = new AbortController();
	private readonly parent: CancelContext;
	private readonly ownDeadline: Date | undefined;
	private status: ContextError | undefined;
	private frozenCause: unknown;
	private timer: ReturnType<typeof setTimeout> | undefined;
	private detachParent: (() => void) | undefined;

	constructor(parent: CancelContext, options?: CancelNodeOptions) {
		this.id = ++nodeIdCounter;
		this.parent = parent;

		const requested = options?.deadline;
		if (requested !== undefined && Number.isNaN(requested.getTime())) {
			throw new MisuseError("deadline must be a valid date");
		}
		const inherited = parent.deadline();
		this.ownDeadline =
			requested !== undefined &&
			(inherited === undefined || requested.getTime() < inherited.getTime())
				? requested
				: undefined;

		if (parent.signal.aborted) {
			if (debugContext.enabled) {
				debugContext("[node-%d] parent already closed", this.id);
			}
			this.close(parent.err() ?? Canceled, parent.cause());
			return;
		}

		// The background signal never aborts; a listener there would only pile up.
		if (parent !== BACKGROUND) {
			const onParentDone = () => {
				this.close(parent.err() ?? Canceled, parent.cause());
			};
			parent.signal.addEventListener("abort", onParentDone, { once: true });
			this.detachParent = () => {
				parent.signal.removeEventListener("abort", onParentDone);
			};
		}

		if (this.ownDeadline) {
			this.arm(this.ownDeadline, options?.deadlineCause);
		}
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	get telemetry(): Context {
		return this.parent.telemetry;
	}

	deadline(): Date | undefined {
		return this.ownDeadline ?? this.parent.deadline();
	}

	err(): ContextError | undefined {
		return this.status;
	}

	cause(): unknown {
		return this.status ? this.frozenCause : undefined;
	}

	/**
	 * Close the node. Only the first call has any effect.
	 */
	readonly cancel = (cause?: unknown): void => {
		this.close(Canceled, cause);
	};

	private arm(at: Date, cause: unknown): void {
		const remaining = at.getTime() - Date.now();
		if (remaining <= 0) {
			this.close(DeadlineExceeded, cause);
			return;
		}
		this.timer = setTimeout(
			() => this.arm(at, cause),
			Math.min(remaining, MAX_TIMER_DELAY),
		);
	}

	private close(status: ContextError, cause: unknown): void {
		if (this.status) return;
		this.status = status;
		this.frozenCause = cause ?? status;

		if (this.timer !== undefined) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
		this.detachParent?.();
		this.detachParent = undefined;

		if (debugContext.enabled) {
			debugContext(
				"[node-%d] closed (%s): %O",
				this.id,
				status.message,
				this.frozenCause,
			);
		}
		this.controller.abort(this.frozenCause);
	}
}
