import { ConfigError, RateLimitError } from "../../shared/errors.js";
import { type Clock, type Sleep, sleep as realSleep } from "../../shared/time.js";

export interface RateLimiterConfig {
	/** Burst size. */
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock: Clock;
	readonly sleep?: Sleep;
}

/**
 * Token bucket in front of the exchange REST endpoints. Tokens accumulate at
 * `refillRate` per second up to `capacity`; each request takes one.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private tokens: number;
	private lastRefillMs: number;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate < 0) {
			throw new ConfigError("refillRate must be >= 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.sleep = config.sleep ?? realSleep;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	tryAcquire(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/** 0 when a token is available now; Infinity when the bucket never refills. */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		if (this.refillRate === 0) {
			return Number.POSITIVE_INFINITY;
		}
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/**
	 * Wait for a token and take it.
	 * @throws RateLimitError when no token can arrive within `timeoutMs`
	 */
	async acquire(timeoutMs = 30_000): Promise<void> {
		const startMs = this.clock.now();
		while (!this.tryAcquire()) {
			const waitMs = this.timeUntilNextTokenMs();
			const elapsed = this.clock.now() - startMs;
			if (elapsed + waitMs > timeoutMs) {
				throw new RateLimitError("Timed out waiting for a rate limit token", waitMs, { timeoutMs });
			}
			await this.sleep(waitMs);
		}
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.refillRate);
		this.lastRefillMs = now;
	}
}
