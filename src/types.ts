/**
 * Type definitions and interfaces for scopeline
 */

import type { Context, Tracer } from "@opentelemetry/api";
import type { ContextError } from "./errors.js";

// Re-export OpenTelemetry types for users
export type { Context, Tracer };

/**
 * A cancellation-aware context: the underlying primitive every scope wraps.
 *
 * Cancellation is cooperative. Long-running work must watch `signal` (or use
 * the helpers in `cancellation.ts`) and return once it aborts.
 */
export interface CancelContext {
	/** Done-signal. Aborts exactly once; its `reason` is the frozen cause. */
	readonly signal: AbortSignal;
	/** OpenTelemetry context carrying the label baggage of this context. */
	readonly telemetry: Context;
	/** Nearest enclosing deadline, if any. */
	deadline(): Date | undefined;
	/** `undefined` while open, `Canceled` or `DeadlineExceeded` once closed. */
	err(): ContextError | undefined;
	/** `undefined` while open, the cause frozen at closure afterwards. */
	cause(): unknown;
}

/**
 * Cancels a context. An `undefined` or `null` cause records `Canceled`.
 */
export type CancelCauseFunc = (cause?: unknown) => void;

/**
 * Cancels a context with the generic `Canceled` cause.
 */
export type CancelFunc = () => void;

/**
 * Canonical unit of work: no arguments, fails by throwing or rejecting.
 */
export type PlainFunc = () => Promise<void> | void;

/**
 * A unit of work that receives the generic cancellation-aware context.
 */
export type ContextFunc = (ctx: CancelContext) => Promise<void> | void;

/**
 * Log levels understood by {@link Logger} implementations.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for structured logging integration
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Options for scope with logging
 */
export interface ScopeLoggingOptions {
	/** Logger instance */
	logger?: Logger;
	/** Minimum log level */
	logLevel?: LogLevel;
}

/**
 * States a task group moves through.
 * - `empty`: nothing spawned yet
 * - `running`: at least one task outstanding
 * - `draining`: every task returned, `wait()` has not returned yet
 * - `settled`: `wait()` returned; the captured error is final
 */
export type TaskGroupState = "empty" | "running" | "draining" | "settled";
