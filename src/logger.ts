/**
 * Logging for scopeline
 *
 * One logger serves a whole scope tree. Each scope wraps it in a
 * {@link ScopeLogger} so every line names the scope it came from.
 */

import type { Logger, LogLevel, ScopeLoggingOptions } from "./types.js";

const LEVELS: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
});

/**
 * Writes to the console, dropping lines below `level`.
 */
export class ConsoleLogger implements Logger {
	private readonly threshold: number;

	constructor(level: LogLevel = "info") {
		this.threshold = LEVELS[level];
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.enabled("debug")) console.debug(message, ...args);
	}

	info(message: string, ...args: unknown[]): void {
		if (this.enabled("info")) console.info(message, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.enabled("warn")) console.warn(message, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		if (this.enabled("error")) console.error(message, ...args);
	}

	private enabled(level: LogLevel): boolean {
		return LEVELS[level] >= this.threshold;
	}
}

/**
 * Discards everything. The default when no logger or level is configured.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Prefixes each message with `[scopeName]` before handing it to `inner`.
 * Arguments pass through untouched.
 *
 * @example
 * ```typescript
 * const log = new ScopeLogger(new ConsoleLogger("debug"), "ingest#3")
 * log.warn("slow task", { ms: 1200 }) // "[ingest#3] slow task" { ms: 1200 }
 * ```
 */
export class ScopeLogger implements Logger {
	constructor(
		private readonly inner: Logger,
		readonly scopeName: string,
	) {}

	debug(message: string, ...args: unknown[]): void {
		this.inner.debug(this.prefix(message), ...args);
	}

	info(message: string, ...args: unknown[]): void {
		this.inner.info(this.prefix(message), ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.inner.warn(this.prefix(message), ...args);
	}

	error(message: string, ...args: unknown[]): void {
		this.inner.error(this.prefix(message), ...args);
	}

	private prefix(message: string): string {
		return `[${this.scopeName}] ${message}`;
	}
}

/**
 * The logger shared by a scope tree: `options.logger` when given, a
 * ConsoleLogger when only `options.logLevel` is set, otherwise a NoOpLogger.
 */
export function resolveLogger(options?: ScopeLoggingOptions): Logger {
	if (options?.logger) return options.logger;
	if (options?.logLevel) return new ConsoleLogger(options.logLevel);
	return new NoOpLogger();
}
