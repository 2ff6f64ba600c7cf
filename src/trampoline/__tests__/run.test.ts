import { afterEach, describe, it, expect, vi } from "vitest";

import type { Trampoline } from "../node";
import { bind, later, now } from "../combinators";
import { run } from "../run";

import * as Log from "@stackless/shared/logging";
import { configure } from "@stackless/shared/config/options";

class Watchdog extends Error {}

describe("Driver loop: stack safety", () => {
	it("runs a million left-associated binds", () => {
		let t: Trampoline<number> = now(0);
		for (let i = 0; i < 1_000_000; i++) {
			t = bind(t, x => now(x + 1));
		}
		expect(run(t)).toBe(1_000_000);
	}, 60_000);

	it("runs a deep right-associated chain built on demand", () => {
		const count = (n: number): Trampoline<number> => (n === 500_000 ? now(n) : bind(now(n), x => count(x + 1)));
		expect(run(count(0))).toBe(500_000);
	}, 60_000);

	it("runs non tail recursion through suspensions", () => {
		const sum = (n: number): Trampoline<number> => (n === 0 ? now(0) : bind(later(() => sum(n - 1)), s => now(s + n)));
		expect(run(sum(100_000))).toBe(5_000_050_000);
	}, 60_000);

	it("runs mutual recursion through suspensions", () => {
		const isEven = (n: number): Trampoline<boolean> => (n === 0 ? now(true) : later(() => isOdd(n - 1)));
		const isOdd = (n: number): Trampoline<boolean> => (n === 0 ? now(false) : later(() => isEven(n - 1)));

		expect(run(isEven(200_001))).toBe(false);
		expect(run(isOdd(200_001))).toBe(true);
	}, 60_000);
});

describe("Driver loop: evaluation", () => {
	it("returns a pure value without any further step", () => {
		expect(run(now("done"))).toBe("done");
	});

	it("re-executes captured thunks when a computation is run twice", () => {
		let calls = 0;
		const t = later(() => {
			calls++;
			return now(calls);
		});

		expect(run(t)).toBe(1);
		expect(run(t)).toBe(2);
	});

	it("propagates a failure from a continuation unchanged and runs nothing after it", () => {
		const failure = new TypeError("boom");
		const after = vi.fn((n: number) => now(n));
		const t = bind(
			bind(now(1), (): Trampoline<number> => {
				throw failure;
			}),
			after,
		);

		expect(() => run(t)).toThrow(failure);
		expect(after).not.toHaveBeenCalled();
	});

	it("propagates a failure from a thunk unchanged", () => {
		const t = bind(
			later((): Trampoline<number> => {
				throw new RangeError("nope");
			}),
			n => now(n + 1),
		);

		expect(() => run(t)).toThrowError(new RangeError("nope"));
	});

	it("never returns from unconditional self-suspension", () => {
		const deadline = Date.now() + 200;
		let suspensions = 0;
		const forever: Trampoline<never> = later(() => {
			suspensions++;
			if (Date.now() > deadline) {
				throw new Watchdog("timed out");
			}
			return forever;
		});

		expect(() => run(forever)).toThrow(Watchdog);
		expect(suspensions).toBeGreaterThan(1);
	});
});

describe("Driver loop: logging", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		configure({ logLevel: "warn", traceSteps: false, verbose: false });
	});

	it("does not log below debug level", () => {
		const debug = vi.spyOn(Log.logger, "debug").mockImplementation(() => Log.logger);
		run(bind(now(1), x => now(x + 1)));
		expect(debug).not.toHaveBeenCalled();
	});

	it("logs how many steps a computation took", () => {
		configure({ logLevel: "debug" });
		const debug = vi.spyOn(Log.logger, "debug").mockImplementation(() => Log.logger);

		// the bind, then the leaf its continuation returns
		run(bind(now(1), x => now(x + 1)));

		expect(debug).toHaveBeenCalledOnce();
		expect(debug).toHaveBeenCalledWith("Resolved after 2 steps");
	});

	it("traces every resumed node when asked to", () => {
		configure({ logLevel: "silly", traceSteps: true });
		vi.spyOn(Log.logger, "debug").mockImplementation(() => Log.logger);
		const silly = vi.spyOn(Log.logger, "silly").mockImplementation(() => Log.logger);

		run(later(() => now(1)));

		expect(silly.mock.calls).toEqual([["[step 1] Suspend"], ["[step 2] Done(number)"]]);
	});

	it("labels log lines while running and restores the label afterwards", () => {
		configure({ logLevel: "debug" });
		const labels: string[] = [];
		vi.spyOn(Log.logger, "debug").mockImplementation(() => {
			labels.push(Log.peek() ?? "");
			return Log.logger;
		});

		run(now(1));

		expect(labels).toEqual(["run"]);
		expect(Log.peek()).toBe("stackless");
	});

	it("verbose turns on debug output", () => {
		configure({ verbose: true });
		expect(Log.logger.isDebugEnabled()).toBe(true);
	});
});
