/**
 * scopeline - Cancellable coordination scopes for structured concurrency
 *
 * A scope propagates cancellation and its cause down a tree of derived
 * scopes, aggregates the first failure of the tasks spawned in it, and
 * carries a shared value store and task labels for profiling.
 */

export {
	onDone,
	sleep,
	throwIfDone,
	whenDone,
} from "./cancellation.js";
export {
	background,
	CancelNode,
	type CancelNodeOptions,
	fromSignal,
} from "./context.js";
export {
	withCancel,
	withCancelCause,
	withDeadline,
	withSignals,
	withTimeout,
} from "./derive.js";
export {
	type ContextTask,
	go,
	goLabelled,
	normalize,
	type PlainTask,
	plain,
	type ScopeFunc,
	type ScopeTask,
	type TaskFunc,
	withContext,
	withScope,
} from "./dispatch.js";
export {
	Canceled,
	CanceledError,
	type ContextError,
	DeadlineExceeded,
	DeadlineExceededError,
	MisuseError,
	SignalReceivedError,
	toError,
	UnknownError,
} from "./errors.js";
export {
	backgroundScope,
	type ScopeOptions,
	scope,
	scopeFrom,
} from "./factory.js";
export {
	type Health,
	HealthCore,
	type HealthItem,
} from "./health.js";
export {
	type Label,
	LabelledContext,
	type LabelSet,
	labels,
	labelsFromContext,
	taskLabels,
	withLabels,
} from "./labels.js";
export {
	ConsoleLogger,
	NoOpLogger,
	resolveLogger,
	ScopeLogger,
} from "./logger.js";
export {
	applyOptions,
	cancelOnSignals,
	compose,
	deadlineAt,
	labelled,
	onCancel,
	onCancelCause,
	reportsTo,
	type ScopeOption,
	seededWith,
	timeoutAfter,
} from "./options.js";
export { type Profiler, TracingProfiler } from "./profiler.js";
export { Scope, type ScopeRuntime } from "./scope.js";
export {
	DEFAULT_SIGNALS,
	processSignals,
	type SignalSource,
	type SignalSubscription,
} from "./signals.js";
export { TaskGroup } from "./task-group.js";
export type {
	CancelCauseFunc,
	CancelContext,
	CancelFunc,
	Context,
	ContextFunc,
	Logger,
	LogLevel,
	PlainFunc,
	ScopeLoggingOptions,
	TaskGroupState,
	Tracer,
} from "./types.js";
export {
	ConditionalRunner,
	FlagKey,
	parseInteger,
	ValueStore,
} from "./values.js";
