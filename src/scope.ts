/**
 * Scope class for scopeline - Structured concurrency
 */

import type { Context } from "@opentelemetry/api";
import createDebug from "debug";
import { Canceled, type ContextError, MisuseError } from "./errors.js";
import { type LabelSet, labelsFromContext } from "./labels.js";
import { ScopeLogger } from "./logger.js";
import type { Profiler } from "./profiler.js";
import type { SignalSource } from "./signals.js";
import type { TaskGroup } from "./task-group.js";
import type {
	CancelCauseFunc,
	CancelContext,
	Logger,
	PlainFunc,
} from "./types.js";
import type { ConditionalRunner, FlagKey, ValueStore } from "./values.js";

const debugScope = createDebug("scopeline:scope");

let scopeIdCounter = 0;

/**
 * Collaborators shared by a root scope and every scope derived from it.
 */
export interface ScopeRuntime {
	readonly name: string;
	readonly group: TaskGroup;
	readonly values: ValueStore;
	readonly flags: ConditionalRunner;
	readonly profiler: Profiler;
	readonly signals: SignalSource;
	readonly logger: Logger;
}

/**
 * A coordination scope: a cancellable context with a frozen cause, a LIFO
 * cleanup chain, a task group and a value store.
 *
 * Derived scopes get their own cancellation but share the task group and
 * the value store, so `wait()` on any of them aggregates the whole tree.
 *
 * Cancellation is cooperative. Tasks must watch `signal` (or use
 * `whenDone`, `throwIfDone`, `sleep`) and return once it aborts.
 *
 * @example
 * ```typescript
 * const s = scope()
 * s.go(() => fetchUsers(s.signal))
 * s.go(() => fetchOrders(s.signal))
 * const err = await s.wait()
 * ```
 */
export class Scope implements CancelContext, AsyncDisposable {
	readonly id: number;
	private ctx: CancelContext;
	private readonly baseCancel: CancelCauseFunc;
	private readonly runtime: ScopeRuntime;
	private readonly log: ScopeLogger;
	private readonly cleanups: ((cause: unknown) => void)[] = [];
	private cleanupsRan = false;
	private unwatch: (() => void) | undefined;

	constructor(
		ctx: CancelContext,
		cancel: CancelCauseFunc,
		runtime: ScopeRuntime,
	) {
		this.id = ++scopeIdCounter;
		this.ctx = ctx;
		this.baseCancel = cancel;
		this.runtime = runtime;
		this.log = new ScopeLogger(runtime.logger, this.name);
		if (debugScope.enabled) {
			debugScope("[%s] created scope #%d", runtime.name, this.id);
		}
		this.watch();
	}

	/**
	 * The done-signal. Its `reason` is the frozen cause.
	 */
	get signal(): AbortSignal {
		return this.ctx.signal;
	}

	get telemetry(): Context {
		return this.ctx.telemetry;
	}

	get name(): string {
		return `${this.runtime.name}#${this.id}`;
	}

	/**
	 * The value store shared across this scope tree.
	 */
	get values(): ValueStore {
		return this.runtime.values;
	}

	/**
	 * The task group shared across this scope tree.
	 */
	get group(): TaskGroup {
		return this.runtime.group;
	}

	get signalSource(): SignalSource {
		return this.runtime.signals;
	}

	/**
	 * The tree's logger, prefixing each line with this scope's name.
	 */
	get logger(): Logger {
		return this.log;
	}

	done(): AbortSignal {
		return this.ctx.signal;
	}

	deadline(): Date | undefined {
		return this.ctx.deadline();
	}

	err(): ContextError | undefined {
		return this.ctx.err();
	}

	cause(): unknown {
		return this.ctx.cause();
	}

	/**
	 * This scope seen as a plain cancellation context.
	 */
	asContext(): CancelContext {
		return this;
	}

	/**
	 * Cancel with the generic `Canceled` cause. Idempotent.
	 */
	cancel(): void {
		this.cancelWithCause(Canceled);
	}

	/**
	 * Cancel recording `cause`, unless a cause was already recorded.
	 * `undefined` and `null` record `Canceled`.
	 */
	cancelWithCause(cause: unknown): void {
		if (!this.ctx.signal.aborted) {
			if (debugScope.enabled) {
				debugScope("[%s] cancelling: %O", this.name, cause);
			}
			this.log.debug("cancelling", { cause });
		}
		this.baseCancel(cause ?? Canceled);
		this.runCleanups();
	}

	/**
	 * Run `fn` when this scope closes, before every previously pushed cleanup.
	 * Runs immediately if the scope is already closed.
	 *
	 * The done-signal has already aborted when `fn` runs, so `err()` is set
	 * and tasks watching the signal are on their way out.
	 */
	pushCleanup(fn: () => void): void {
		this.pushCleanupWithCause(() => fn());
	}

	/**
	 * Like {@link pushCleanup}, but `fn` receives the frozen cause.
	 */
	pushCleanupWithCause(fn: (cause: unknown) => void): void {
		if (this.cleanupsRan) {
			this.invokeCleanup(fn, this.cause());
			return;
		}
		this.cleanups.push(fn);
	}

	/**
	 * Swap the underlying context for `transform(current)`. Cleanups pushed on
	 * this scope are kept and follow the new done-signal. `cancel` keeps
	 * targeting the original cancellation source.
	 */
	replaceUnderlying(transform: (ctx: CancelContext) => CancelContext): void {
		this.unwatch?.();
		this.unwatch = undefined;
		this.ctx = transform(this.ctx);
		this.watch();
	}

	/**
	 * A new scope over `ctx`/`cancel` that shares this scope's task group,
	 * value store and collaborators. The cleanup chain starts empty.
	 */
	deriveFrom(ctx: CancelContext, cancel: CancelCauseFunc): Scope {
		return new Scope(ctx, cancel, this.runtime);
	}

	/**
	 * Run `fn` in the shared task group.
	 * The first failure cancels the group and is returned by `wait()`.
	 */
	go(fn: PlainFunc): void {
		this.runtime.group.spawn(fn);
	}

	/**
	 * Like {@link go}, with `set` (on top of this scope's own labels)
	 * attached through the profiler while `fn` runs.
	 */
	goLabelled(set: LabelSet, fn: PlainFunc): void {
		if (typeof fn !== "function") {
			throw new MisuseError(`[${this.name}] cannot spawn ${String(fn)}`);
		}
		const telemetry = this.telemetry;
		const profiler = this.runtime.profiler;
		// The profiler's promise is the only path back into the group, so a
		// labelled unit settles the group exactly like an unlabelled one.
		this.runtime.group.spawn(() =>
			profiler.run(telemetry, set, async () => {
				await fn();
			}),
		);
	}

	/**
	 * Resolves once every task in the tree has returned, with the first
	 * failure or `undefined`.
	 */
	wait(): Promise<Error | undefined> {
		return this.runtime.group.wait();
	}

	/**
	 * Labels attached to this scope.
	 */
	labels(): LabelSet {
		return labelsFromContext(this.telemetry);
	}

	set(key: unknown, value: unknown): void {
		this.runtime.values.set(key, value);
	}

	getExists(key: unknown): [value: unknown, found: boolean] {
		return this.runtime.values.getExists(key);
	}

	get(key: unknown): unknown {
		return this.runtime.values.get(key);
	}

	getString(key: unknown): string {
		return this.runtime.values.getString(key);
	}

	getInt(key: unknown): number {
		return this.runtime.values.getInt(key);
	}

	setFlag(key: FlagKey, value: boolean): void {
		this.runtime.flags.setFlag(key, value);
	}

	runIf(key: FlagKey, fn: () => void): boolean {
		return this.runtime.flags.runIf(key, fn);
	}

	/**
	 * Cancel the scope and wait for the task group to drain.
	 * The captured failure stays readable through `group.error`.
	 */
	async [Symbol.asyncDispose](): Promise<void> {
		if (debugScope.enabled) {
			debugScope("[%s] disposing scope", this.name);
		}
		this.cancel();
		const failure = await this.wait();
		if (failure && debugScope.enabled) {
			debugScope("[%s] disposed with failure: %s", this.name, failure.message);
		}
	}

	private watch(): void {
		const signal = this.ctx.signal;
		if (signal.aborted) {
			this.runCleanups();
			return;
		}
		const handler = () => this.runCleanups();
		signal.addEventListener("abort", handler, { once: true });
		this.unwatch = () => signal.removeEventListener("abort", handler);
	}

	private runCleanups(): void {
		if (this.cleanupsRan) return;
		this.cleanupsRan = true;
		this.unwatch?.();
		this.unwatch = undefined;

		const cause = this.cause();
		if (debugScope.enabled) {
			debugScope(
				"[%s] running %d cleanups",
				this.name,
				this.cleanups.length,
			);
		}
		for (let i = this.cleanups.length - 1; i >= 0; i--) {
			const fn = this.cleanups[i];
			if (fn) {
				this.invokeCleanup(fn, cause);
			}
		}
		this.cleanups.length = 0;
	}

	private invokeCleanup(fn: (cause: unknown) => void, cause: unknown): void {
		try {
			fn(cause);
		} catch (error) {
			if (debugScope.enabled) {
				debugScope("[%s] cleanup error: %s", this.name, error);
			}
			this.log.error("cleanup failed", error);
		}
	}
}
