/**
 * Tests for derived scopes: cancel, deadline, timeout and signals
 */

import { describe, expect, test } from "vitest";
import {
	Canceled,
	DeadlineExceeded,
	MisuseError,
	scope,
	SignalReceivedError,
	type SignalSource,
	type SignalSubscription,
	sleep,
	whenDone,
	withCancel,
	withCancelCause,
	withDeadline,
	withSignals,
	withTimeout,
} from "../src/index.js";

const wait = (ms: number) => new Promise((r) => setTimeout(r, ms));

interface FakeSubscription {
	readonly signals: readonly NodeJS.Signals[];
	stopped: boolean;
	deliver(name: NodeJS.Signals): void;
}

class FakeSignals implements SignalSource {
	readonly subscriptions: FakeSubscription[] = [];

	notify(signals: readonly NodeJS.Signals[]): SignalSubscription {
		const controller = new AbortController();
		let received: NodeJS.Signals | undefined;
		const entry: FakeSubscription = {
			signals,
			stopped: false,
			deliver(name) {
				if (entry.stopped || !signals.includes(name)) return;
				received = name;
				entry.stopped = true;
				controller.abort(name);
			},
		};
		this.subscriptions.push(entry);
		return {
			signal: controller.signal,
			received: () => received,
			stop: () => {
				entry.stopped = true;
			},
		};
	}

	emit(name: NodeJS.Signals): void {
		for (const entry of this.subscriptions) {
			entry.deliver(name);
		}
	}
}

describe("withCancelCause", () => {
	test("cancels the child with a cause and leaves the parent open", () => {
		const parent = scope();
		const [child, cancel] = withCancelCause(parent);
		const cause = new Error("child cause");

		cancel(cause);

		expect(child.err()).toBe(Canceled);
		expect(child.cause()).toBe(cause);
		expect(parent.err()).toBeUndefined();
		parent.cancel();
	});

	test("cancel without a cause records Canceled", () => {
		const parent = scope();
		const [child, cancel] = withCancelCause(parent);

		cancel();

		expect(child.cause()).toBe(Canceled);
		parent.cancel();
	});

	test("the child closes with the parent's cause", () => {
		const parent = scope();
		const [child] = withCancelCause(parent);
		const cause = new Error("parent cause");

		parent.cancelWithCause(cause);

		expect(child.err()).toBe(Canceled);
		expect(child.cause()).toBe(cause);
	});

	test("the child runs its own cleanups when the parent closes", () => {
		const parent = scope();
		const [child] = withCancelCause(parent);
		const order: string[] = [];

		parent.pushCleanup(() => order.push("parent"));
		child.pushCleanup(() => order.push("child"));
		parent.cancel();

		expect(order).toContain("parent");
		expect(order).toContain("child");
	});

	test("the child shares the parent's values", () => {
		const parent = scope();
		const [child, cancel] = withCancelCause(parent);

		child.set("written-by-child", "yes");

		expect(parent.getString("written-by-child")).toBe("yes");
		cancel();
		parent.cancel();
	});
});

describe("withCancel", () => {
	test("cancels with Canceled", () => {
		const parent = scope();
		const [child, cancel] = withCancel(parent);

		cancel();

		expect(child.err()).toBe(Canceled);
		expect(child.cause()).toBe(Canceled);
		expect(parent.err()).toBeUndefined();
		parent.cancel();
	});
});

describe("withDeadline", () => {
	test("closes with DeadlineExceeded once the deadline passes", async () => {
		const parent = scope();
		const [child] = withDeadline(parent, new Date(Date.now() + 20));

		expect(await whenDone(child)).toBe(DeadlineExceeded);
		expect(child.cause()).toBe(DeadlineExceeded);
		expect(parent.err()).toBeUndefined();
		parent.cancel();
	});

	test("a deadline cause is kept apart from err", async () => {
		const parent = scope();
		const cause = new Error("request budget spent");
		const [child] = withDeadline(parent, new Date(Date.now() + 20), cause);

		await whenDone(child);

		expect(child.err()).toBe(DeadlineExceeded);
		expect(child.cause()).toBe(cause);
		parent.cancel();
	});

	test("a later deadline than the parent's keeps the parent's", () => {
		const soon = new Date(Date.now() + 60_000);
		const [parent, cancelParent] = withDeadline(scope(), soon);
		const [child] = withDeadline(parent, new Date(Date.now() + 120_000));

		expect(child.deadline()).toBe(soon);
		cancelParent();
		expect(child.err()).toBe(Canceled);
	});

	test("cancel before the deadline reports Canceled", () => {
		const parent = scope();
		const [child, cancel] = withDeadline(
			parent,
			new Date(Date.now() + 60_000),
		);

		cancel();

		expect(child.err()).toBe(Canceled);
		parent.cancel();
	});
});

describe("withTimeout", () => {
	test("reports DeadlineExceeded after the timeout", async () => {
		const parent = scope();
		const [child] = withTimeout(parent, 50);

		expect(child.err()).toBeUndefined();
		await wait(120);

		expect(child.err()).toBe(DeadlineExceeded);
		parent.cancel();
	});

	test("sleep inside a timed-out scope rejects with DeadlineExceeded", async () => {
		const parent = scope();
		const [child] = withTimeout(parent, 20);

		await expect(sleep(child, 5_000)).rejects.toBe(DeadlineExceeded);
		parent.cancel();
	});

	test.each([-1, Number.NaN, Number.POSITIVE_INFINITY])(
		"rejects a timeout of %s",
		(ms) => {
			const parent = scope();

			expect(() => withTimeout(parent, ms)).toThrow(MisuseError);
			parent.cancel();
		},
	);

	test("tasks spawned on the child settle the shared group", async () => {
		const parent = scope();
		const [child] = withTimeout(parent, 20);

		child.go(async () => {
			throw await whenDone(child);
		});

		expect(await parent.wait()).toBe(DeadlineExceeded);
		expect(parent.cause()).toBe(DeadlineExceeded);
	});
});

describe("withSignals", () => {
	test("closes with a SignalReceivedError cause", () => {
		const signals = new FakeSignals();
		const parent = scope({ signals });
		const [child] = withSignals(parent, "SIGHUP");

		signals.emit("SIGHUP");

		expect(child.err()).toBe(Canceled);
		const cause = child.cause();
		expect(cause).toBeInstanceOf(SignalReceivedError);
		expect(cause instanceof SignalReceivedError && cause.signal).toBe(
			"SIGHUP",
		);
		expect(parent.err()).toBeUndefined();
		parent.cancel();
	});

	test("listens for SIGTERM and SIGINT by default", () => {
		const signals = new FakeSignals();
		const parent = scope({ signals });

		withSignals(parent);

		expect(signals.subscriptions[0]?.signals).toEqual(["SIGTERM", "SIGINT"]);
		parent.cancel();
	});

	test("ignores signals it did not ask for", () => {
		const signals = new FakeSignals();
		const parent = scope({ signals });
		const [child, cancel] = withSignals(parent, "SIGTERM");

		signals.emit("SIGUSR2");

		expect(child.err()).toBeUndefined();
		cancel();
	});

	test("stops listening once the child is cancelled", () => {
		const signals = new FakeSignals();
		const parent = scope({ signals });
		const [child, cancel] = withSignals(parent, "SIGTERM");

		cancel();
		signals.emit("SIGTERM");

		expect(signals.subscriptions[0]?.stopped).toBe(true);
		expect(child.cause()).toBe(Canceled);
		parent.cancel();
	});

	test("stops listening when the parent closes", () => {
		const signals = new FakeSignals();
		const parent = scope({ signals });
		withSignals(parent, "SIGTERM");

		parent.cancel();

		expect(signals.subscriptions[0]?.stopped).toBe(true);
	});
});
