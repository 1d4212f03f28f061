/**
 * Process signal collaborator for scopeline
 */

import process from "node:process";
import createDebug from "debug";

const debugSignals = createDebug("scopeline:signals");

/**
 * Signals a signal-triggered scope listens for when none are given.
 */
export const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = Object.freeze([
	"SIGTERM",
	"SIGINT",
]);

/**
 * A registration returned by {@link SignalSource.notify}.
 */
export interface SignalSubscription {
	/** Aborts when one of the requested signals arrives. */
	readonly signal: AbortSignal;
	/** The signal that arrived, if any. */
	received(): NodeJS.Signals | undefined;
	/** Deregisters the listeners. Safe to call more than once. */
	stop(): void;
}

/**
 * Where signal-triggered scopes get their signals from.
 */
export interface SignalSource {
	notify(signals: readonly NodeJS.Signals[]): SignalSubscription;
}

/**
 * Signal source backed by the current process.
 *
 * While subscribed, the listed signals no longer run Node's default handler
 * (for SIGINT and SIGTERM: exiting). `stop` restores it once no other
 * listener remains.
 */
export const processSignals: SignalSource = {
	notify(signals) {
		const controller = new AbortController();
		let receivedSignal: NodeJS.Signals | undefined;
		let stopped = false;

		const stop = () => {
			if (stopped) return;
			stopped = true;
			for (const name of signals) {
				process.removeListener(name, handler);
			}
			if (debugSignals.enabled) {
				debugSignals("stopped listening for %s", signals.join(", "));
			}
		};

		const handler = (name: NodeJS.Signals) => {
			if (receivedSignal !== undefined) return;
			receivedSignal = name;
			if (debugSignals.enabled) {
				debugSignals("received %s", name);
			}
			stop();
			controller.abort(name);
		};

		for (const name of signals) {
			process.on(name, handler);
		}
		if (debugSignals.enabled) {
			debugSignals("listening for %s", signals.join(", "));
		}

		return {
			signal: controller.signal,
			received: () => receivedSignal,
			stop,
		};
	},
};
