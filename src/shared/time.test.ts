import { describe, expect, it } from "vitest";
import { Duration, FakeClock, SystemClock, sleep } from "./time.js";

describe("Clock", () => {
	it("SystemClock tracks wall time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	describe("FakeClock", () => {
		it("starts at the given time and advances", () => {
			const clock = new FakeClock(100);
			clock.advance(50);
			expect(clock.now()).toBe(150);
			clock.set(9999);
			expect(clock.now()).toBe(9999);
		});

		it("rejects a negative advance", () => {
			const clock = new FakeClock(100);
			expect(() => clock.advance(-1)).toThrow("non-negative ms, got -1");
		});

		it("sleep advances virtual time and records the call", async () => {
			const clock = new FakeClock(1_000);
			await clock.sleep(5_000);
			await clock.sleep(250);
			expect(clock.now()).toBe(6_250);
			expect(clock.sleepCalls).toEqual([5_000, 250]);
		});

		it("sleep works when detached from the instance", async () => {
			const clock = new FakeClock();
			const detached = clock.sleep;
			await detached(10);
			expect(clock.now()).toBe(10);
		});
	});

	it("real sleep resolves", async () => {
		await expect(sleep(1)).resolves.toBeUndefined();
	});
});

describe("Duration", () => {
	it("converts units to milliseconds", () => {
		expect(Duration.seconds(10)).toBe(10_000);
		expect(Duration.minutes(60)).toBe(3_600_000);
		expect(Duration.hours(1)).toBe(3_600_000);
		expect(Duration.days(30)).toBe(2_592_000_000);
	});
});
