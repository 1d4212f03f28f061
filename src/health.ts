/**
 * Liveness registry for scopeline
 */

import createDebug from "debug";
import { NoOpLogger, ScopeLogger } from "./logger.js";
import type { Logger } from "./types.js";

const debugHealth = createDebug("scopeline:health");

/**
 * Handle returned by {@link Health.start}.
 */
export interface HealthItem {
	stop(): void;
}

/**
 * Tracks which named processes are alive.
 */
export interface Health {
	start(name: string): HealthItem;
	stop(name: string): void;
	status(): Record<string, boolean>;
}

/**
 * In-memory liveness registry.
 *
 * @example
 * ```typescript
 * const health = new HealthCore()
 * const worker = health.start("worker")
 * health.status() // { worker: true }
 * worker.stop()
 * health.status() // { worker: false }
 * ```
 */
export class HealthCore implements Health {
	private readonly active = new Map<string, boolean>();
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = new ScopeLogger(logger ?? new NoOpLogger(), "health");
	}

	start(name: string): HealthItem {
		if (debugHealth.enabled) {
			debugHealth("start %s", name);
		}
		this.logger.debug("start", { name, active: this.status() });
		this.active.set(name, true);
		return { stop: () => this.stop(name) };
	}

	/**
	 * Marks `name` as stopped. Names that were never started are ignored.
	 */
	stop(name: string): void {
		if (debugHealth.enabled) {
			debugHealth("stop %s", name);
		}
		this.logger.debug("stop", { name, active: this.status() });
		if (this.active.has(name)) {
			this.active.set(name, false);
		}
	}

	/**
	 * A snapshot; later starts and stops do not change it.
	 */
	status(): Record<string, boolean> {
		return Object.fromEntries(this.active);
	}
}
