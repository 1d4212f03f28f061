/**
 * Tests for HealthCore and error helpers
 */

import { describe, expect, test } from "vitest";
import {
	Canceled,
	CanceledError,
	DeadlineExceeded,
	HealthCore,
	SignalReceivedError,
	toError,
	UnknownError,
} from "../src/index.js";

describe("HealthCore", () => {
	test("starts empty", () => {
		expect(new HealthCore().status()).toEqual({});
	});

	test("tracks started and stopped names", () => {
		const health = new HealthCore();
		const worker = health.start("worker");
		health.start("poller");

		expect(health.status()).toEqual({ worker: true, poller: true });

		worker.stop();

		expect(health.status()).toEqual({ worker: false, poller: true });
	});

	test("ignores names that were never started", () => {
		const health = new HealthCore();

		health.stop("ghost");

		expect(health.status()).toEqual({});
	});

	test("status is a snapshot", () => {
		const health = new HealthCore();
		const item = health.start("worker");
		const before = health.status();

		item.stop();

		expect(before).toEqual({ worker: true });
	});
});

describe("errors", () => {
	test("sentinels carry their tags", () => {
		expect(Canceled).toBeInstanceOf(CanceledError);
		expect(Canceled._tag).toBe("CanceledError");
		expect(Canceled.message).toBe("context canceled");
		expect(DeadlineExceeded._tag).toBe("DeadlineExceededError");
		expect(DeadlineExceeded.message).toBe("context deadline exceeded");
	});

	test("SignalReceivedError names the signal", () => {
		const err = new SignalReceivedError("SIGTERM");

		expect(err.signal).toBe("SIGTERM");
		expect(err.message).toBe("received signal SIGTERM");
	});

	test("toError keeps real errors", () => {
		const err = new TypeError("typed");

		expect(toError(err)).toBe(err);
	});

	test("toError wraps other values", () => {
		const wrapped = toError(404);

		expect(wrapped).toBeInstanceOf(UnknownError);
		expect(wrapped.message).toBe("non-error thrown: 404");
		expect(wrapped.cause).toBe(404);
	});
});
