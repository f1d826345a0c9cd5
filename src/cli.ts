#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { config as loadEnvFile } from "dotenv";
import { type Runtime, createRuntime } from "./bootstrap.js";
import { PollLoop } from "./lifecycle/index.js";
import { createLogger } from "./lib/logger/index.js";
import { pruneHistory } from "./maintenance/index.js";
import { loadConfig } from "./shared/config.js";
import { SystemClock } from "./shared/time.js";

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Used only until the configured logger exists. */
const bootLogger = createLogger({ level: "info" });

function positiveInt(raw: string): number {
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidArgumentError("expected a positive integer");
	}
	return value;
}

function openRuntime(envFile: string | undefined): Runtime | null {
	const loaded = loadEnvFile(envFile === undefined ? {} : { path: envFile });
	if (envFile !== undefined && loaded.error !== undefined) {
		bootLogger.error({ err: loaded.error, envFile }, "env file could not be read");
		return null;
	}
	const config = loadConfig(process.env);
	if (!config.ok) {
		bootLogger.error({ err: config.error, variables: config.error.context["variables"] }, "invalid configuration");
		return null;
	}
	const runtime = createRuntime(config.value);
	if (!runtime.ok) {
		bootLogger.error({ err: runtime.error, variables: runtime.error.context["variables"] }, "runtime setup failed");
		return null;
	}
	return runtime.value;
}

/** Resolves with the first shutdown signal received. */
function untilShutdown(): Promise<NodeJS.Signals> {
	return new Promise((resolve) => {
		const handler = (signal: NodeJS.Signals) => {
			for (const s of SHUTDOWN_SIGNALS) process.off(s, handler);
			resolve(signal);
		};
		for (const s of SHUTDOWN_SIGNALS) process.on(s, handler);
	});
}

/** Runs `loops` until a shutdown signal, then stops them. */
async function runUntilShutdown(runtime: Runtime, loops: readonly PollLoop[]): Promise<void> {
	const finished = Promise.all(loops.map((loop) => loop.start()));
	const signal = await untilShutdown();
	runtime.logger.info({ signal }, "shutting down");
	for (const loop of loops) loop.stop();
	await finished;
}

async function withRuntime(action: (runtime: Runtime) => Promise<void>): Promise<void> {
	const runtime = openRuntime(program.opts<{ envFile?: string }>().envFile);
	if (runtime === null) {
		process.exitCode = 1;
		return;
	}
	try {
		await action(runtime);
	} catch (error) {
		runtime.logger.error({ err: error }, "command failed");
		process.exitCode = 1;
	} finally {
		await runtime.close();
	}
}

const program = new Command();

program
	.name("ibs-trader")
	.description("IBS mean-reversion trader for Hyperliquid perpetuals")
	.version("0.1.0")
	.option("--env-file <path>", "dotenv file to load before reading the environment");

program
	.command("migrate")
	.description("Create the signal and bar tables")
	.action(() =>
		withRuntime(async (runtime) => {
			await runtime.migrate();
		}),
	);

program
	.command("ingest")
	.description("Stream candles and store completed coarse bars")
	.action(() =>
		withRuntime(async (runtime) => {
			const ingestor = runtime.createIngestor();
			const started = ingestor.start();
			const signal = await untilShutdown();
			runtime.logger.info({ signal }, "shutting down");
			await ingestor.stop();
			await started;
		}),
	);

program
	.command("decide")
	.description("Turn new bars into trade signals and execute them")
	.action(() =>
		withRuntime(async (runtime) => {
			const reconciled = await runtime.decision.reconcile();
			if (!reconciled.ok) throw reconciled.error;
			const loop = new PollLoop({
				name: "decision",
				intervalMs: runtime.config.decisionPollMs,
				logger: runtime.logger,
				task: async () => {
					let more = true;
					while (more) more = await runtime.decision.pollOnce();
				},
			});
			await runUntilShutdown(runtime, [loop]);
		}),
	);

program
	.command("execute")
	.description("Execute pending signals")
	.option("--once", "run a single pass and exit")
	.action((options: { once?: boolean }) =>
		withRuntime(async (runtime) => {
			if (options.once === true) {
				const summary = await runtime.executor.runOnce();
				runtime.logger.info({ ...summary }, "pass finished");
				return;
			}
			const loop = new PollLoop({
				name: "execution",
				intervalMs: runtime.config.executionPollMs,
				logger: runtime.logger,
				task: () => runtime.executor.runOnce(),
			});
			await runUntilShutdown(runtime, [loop]);
		}),
	);

program
	.command("prune")
	.description("Delete signals and bars older than the retention window")
	.option("--days <n>", "retention in days (default RETENTION_DAYS)", positiveInt)
	.action((options: { days?: number }) =>
		withRuntime(async (runtime) => {
			const days = options.days ?? runtime.config.retentionDays;
			await pruneHistory(runtime.store, days, SystemClock, runtime.logger);
		}),
	);

await program.parseAsync(process.argv);
