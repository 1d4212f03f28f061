/**
 * Task group for scopeline
 */

import createDebug from "debug";
import { MisuseError, toError } from "./errors.js";
import type { CancelCauseFunc, PlainFunc, TaskGroupState } from "./types.js";

const debugGroup = createDebug("scopeline:group");

let groupIdCounter = 0;

/**
 * Tracks concurrently running units of work that share one cancellation.
 *
 * The first unit to fail has its error captured and the bound cancel function
 * called with it, so every other unit can observe cancellation through the
 * shared done-signal. Later failures are discarded.
 *
 * @example
 * ```typescript
 * const node = new CancelNode(background())
 * const group = new TaskGroup(node.cancel)
 * group.spawn(() => fetchUsers(node.signal))
 * group.spawn(() => fetchOrders(node.signal))
 * const err = await group.wait()
 * ```
 */
export class TaskGroup {
	readonly id: number;
	private readonly cancel: CancelCauseFunc;
	private readonly name: string;
	private pending = 0;
	private spawned = 0;
	private failure: Error | undefined;
	private settled = false;
	private waiters: (() => void)[] = [];

	constructor(cancel: CancelCauseFunc, name?: string) {
		this.id = ++groupIdCounter;
		this.cancel = cancel;
		this.name = name ?? `group-${this.id}`;
	}

	/**
	 * Number of units that have not returned yet.
	 */
	get outstanding(): number {
		return this.pending;
	}

	get state(): TaskGroupState {
		if (this.pending > 0) return "running";
		if (this.settled) return "settled";
		return this.spawned === 0 ? "empty" : "draining";
	}

	/**
	 * The first captured failure, if any.
	 */
	get error(): Error | undefined {
		return this.failure;
	}

	/**
	 * Start tracking `fn`. It begins on the next microtask.
	 *
	 * @throws MisuseError if `fn` is not a function
	 */
	spawn(fn: PlainFunc): void {
		if (typeof fn !== "function") {
			throw new MisuseError(`[${this.name}] cannot spawn ${String(fn)}`);
		}

		this.pending++;
		this.spawned++;
		this.settled = false;
		const index = this.spawned;
		if (debugGroup.enabled) {
			debugGroup(
				"[%s] spawning task #%d (outstanding: %d)",
				this.name,
				index,
				this.pending,
			);
		}

		void this.run(fn, index);
	}

	/**
	 * Resolves once every spawned unit has returned, with the first failure.
	 * Settling also cancels the bound context.
	 */
	async wait(): Promise<Error | undefined> {
		if (this.pending > 0) {
			await new Promise<void>((resolve) => {
				this.waiters.push(resolve);
			});
		}

		this.settled = true;
		this.cancel(this.failure);
		if (debugGroup.enabled) {
			debugGroup(
				"[%s] settled (error: %s)",
				this.name,
				this.failure?.message ?? "none",
			);
		}
		return this.failure;
	}

	private async run(fn: PlainFunc, index: number): Promise<void> {
		await Promise.resolve();
		try {
			await fn();
			if (debugGroup.enabled) {
				debugGroup("[%s] task #%d completed", this.name, index);
			}
		} catch (error) {
			this.fail(error, index);
		} finally {
			this.finish();
		}
	}

	private fail(error: unknown, index: number): void {
		if (this.failure) {
			if (debugGroup.enabled) {
				debugGroup(
					"[%s] task #%d failed after group already failed, discarding: %s",
					this.name,
					index,
					error,
				);
			}
			return;
		}

		this.failure = toError(error);
		if (debugGroup.enabled) {
			debugGroup(
				"[%s] task #%d failed, cancelling group: %s",
				this.name,
				index,
				this.failure.message,
			);
		}
		this.cancel(this.failure);
	}

	private finish(): void {
		this.pending--;
		if (this.pending > 0) return;

		const waiters = this.waiters;
		this.waiters = [];
		for (const resolve of waiters) {
			resolve();
		}
	}
}
