export interface ReconnectionConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** `Infinity` retries forever. */
	readonly maxAttempts: number;
	/** Spread applied to each delay, as a fraction of it. */
	readonly jitterFactor: number;
	readonly random?: () => number;
}

export const DEFAULT_RECONNECTION: ReconnectionConfig = {
	baseDelayMs: 1_000,
	maxDelayMs: 60_000,
	maxAttempts: Number.POSITIVE_INFINITY,
	jitterFactor: 0.2,
};

/**
 * Exponential backoff between reconnection attempts. `reset()` after a
 * connection succeeds so the next outage starts from the base delay again.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private readonly random: () => number;
	private count = 0;

	constructor(config: ReconnectionConfig) {
		this.config = config;
		this.random = config.random ?? Math.random;
	}

	get attempts(): number {
		return this.count;
	}

	nextDelay(): number {
		const capped = Math.min(this.config.baseDelayMs * 2 ** this.count, this.config.maxDelayMs);
		this.count += 1;
		if (this.config.jitterFactor === 0) return capped;
		const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	reset(): void {
		this.count = 0;
	}

	shouldRetry(): boolean {
		return this.count < this.config.maxAttempts;
	}
}
