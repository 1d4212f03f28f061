/**
 * Task dispatch for scopeline
 *
 * Tasks come in three shapes. Each shape is tagged explicitly so dispatch is
 * a switch, not a guess based on `fn.length`.
 */

import { MisuseError } from "./errors.js";
import { taskLabels } from "./labels.js";
import type { Scope } from "./scope.js";
import type { ContextFunc, PlainFunc } from "./types.js";

/**
 * A unit of work that receives the full scope: nested spawning, values,
 * flags and labels.
 */
export type ScopeFunc = (scope: Scope) => Promise<void> | void;

export interface PlainTask {
	readonly kind: "plain";
	readonly fn: PlainFunc | undefined;
}

export interface ContextTask {
	readonly kind: "context";
	readonly fn: ContextFunc | undefined;
}

export interface ScopeTask {
	readonly kind: "scope";
	readonly fn: ScopeFunc | undefined;
}

/**
 * A task in any of the accepted shapes. `fn` may be unset (for instance an
 * optional hook); dispatching an unset task is a {@link MisuseError}.
 */
export type TaskFunc = PlainTask | ContextTask | ScopeTask;

export function plain(fn: PlainFunc | undefined): PlainTask {
	return { kind: "plain", fn };
}

export function withContext(fn: ContextFunc | undefined): ContextTask {
	return { kind: "context", fn };
}

export function withScope(fn: ScopeFunc | undefined): ScopeTask {
	return { kind: "scope", fn };
}

/**
 * Turn a task of any shape into the canonical no-argument unit, closing over
 * `scope` for the shapes that take an argument.
 *
 * @throws MisuseError when the task has no function
 */
export function normalize(scope: Scope, task: TaskFunc): PlainFunc {
	switch (task.kind) {
		case "plain": {
			const fn = task.fn;
			if (typeof fn !== "function") throw unset(task.kind);
			return fn;
		}
		case "context": {
			const fn = task.fn;
			if (typeof fn !== "function") throw unset(task.kind);
			return () => fn(scope.asContext());
		}
		case "scope": {
			const fn = task.fn;
			if (typeof fn !== "function") throw unset(task.kind);
			return () => fn(scope);
		}
	}
}

/**
 * Run `task` in the scope's task group.
 *
 * @example
 * ```typescript
 * go(s, plain(() => warmCache()))
 * go(s, withContext((ctx) => poll(ctx.signal)))
 * go(s, withScope((child) => child.go(() => refresh())))
 * ```
 */
export function go(scope: Scope, task: TaskFunc): void {
	scope.go(normalize(scope, task));
}

/**
 * Run `task` in the scope's task group with the `name` and `description`
 * labels (plus any `extra` key/value pairs) attached while it runs.
 */
export function goLabelled(
	scope: Scope,
	name: string,
	description: string,
	task: TaskFunc,
	...extra: string[]
): void {
	scope.goLabelled(
		taskLabels(name, description, ...extra),
		normalize(scope, task),
	);
}

function unset(kind: TaskFunc["kind"]): MisuseError {
	return new MisuseError(`cannot dispatch a ${kind} task without a function`);
}
