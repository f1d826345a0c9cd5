/**
 * Injectable time. Loops, the chase and the decision window read `Clock.now()`
 * and wait through a `Sleep` so tests can run them on virtual time.
 */

export interface Clock {
	now(): number;
}

/** Resolves after `ms` milliseconds. */
export type Sleep = (ms: number) => Promise<void>;

export const SystemClock: Clock = {
	now: () => Date.now(),
};

export const sleep: Sleep = (ms) =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

/** Manual clock whose `sleep` advances time instead of waiting. */
export class FakeClock implements Clock {
	private time: number;
	private readonly sleeps: number[] = [];

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}

	readonly sleep: Sleep = async (ms) => {
		this.sleeps.push(ms);
		this.advance(ms);
	};

	/** Durations passed to `sleep`, in call order. */
	get sleepCalls(): readonly number[] {
		return this.sleeps;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;
