/**
 * PollLoop: runs an async task, waits `intervalMs`, runs it again, until
 * stopped. A task that throws is logged and the loop carries on.
 *
 * Lifecycle: construct → start() (resolves when the loop exits) → stop().
 */

import type { Logger } from "../lib/logger/index.js";
import type { Sleep } from "../shared/time.js";

export interface PollLoopConfig {
	readonly name: string;
	readonly intervalMs: number;
	readonly task: () => Promise<unknown>;
	readonly logger: Logger;
	/** Replaces the built-in timer; the wait then cannot be cut short by stop(). */
	readonly sleep?: Sleep;
}

export class PollLoop {
	private readonly intervalMs: number;
	private readonly task: () => Promise<unknown>;
	private readonly logger: Logger;
	private readonly sleepFn: Sleep | undefined;
	private running: Promise<void> | null = null;
	private stopped = false;
	private wake: (() => void) | null = null;
	private count = 0;

	constructor(config: PollLoopConfig) {
		if (!Number.isFinite(config.intervalMs) || config.intervalMs < 0) {
			throw new RangeError(`intervalMs must be a non-negative number, got ${config.intervalMs}`);
		}
		this.intervalMs = config.intervalMs;
		this.task = config.task;
		this.logger = config.logger.child({ component: "poll-loop", loop: config.name });
		this.sleepFn = config.sleep;
	}

	/** Completed task runs, failed ones included. */
	get iterations(): number {
		return this.count;
	}

	get isRunning(): boolean {
		return this.running !== null;
	}

	/** Starts the loop; calling it again while running returns the same promise. */
	start(): Promise<void> {
		if (this.running !== null) return this.running;
		this.stopped = false;
		this.running = this.run().finally(() => {
			this.running = null;
		});
		return this.running;
	}

	/** Ends the loop after the task in flight, if any. */
	stop(): void {
		this.stopped = true;
		this.wake?.();
	}

	private async run(): Promise<void> {
		this.logger.info({ intervalMs: this.intervalMs }, "loop started");
		while (!this.stopped) {
			try {
				await this.task();
			} catch (error) {
				this.logger.error({ err: error, iteration: this.count }, "loop task failed");
			}
			this.count++;
			if (this.stopped) break;
			await this.pause();
		}
		this.logger.info({ iterations: this.count }, "loop stopped");
	}

	private pause(): Promise<void> {
		if (this.sleepFn !== undefined) return this.sleepFn(this.intervalMs);
		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.wake = null;
				resolve();
			}, this.intervalMs);
			this.wake = () => {
				clearTimeout(timer);
				this.wake = null;
				resolve();
			};
		});
	}
}
