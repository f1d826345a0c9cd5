/**
 * Structured logging backed by pino.
 *
 * Keys that look like secrets (private key, API secret, signature) are
 * censored on every call, on top of any configured redact paths.
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

const SECRET_KEY = /(private_?key|secret|password|signature)/i;

function redactSecrets(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = SECRET_KEY.test(key) ? "[REDACTED]" : value;
	}
	return result;
}

type PinoLevel = "info" | "warn" | "error" | "debug";

function emit(target: pino.Logger, level: PinoLevel, msgOrObj: string | Record<string, unknown>, msg?: string) {
	if (typeof msgOrObj === "string") {
		target[level](msgOrObj);
	} else {
		target[level](redactSecrets(msgOrObj), msg ?? "");
	}
}

function wrapPino(target: pino.Logger): Logger {
	return {
		info: (msgOrObj: string | Record<string, unknown>, msg?: string) => emit(target, "info", msgOrObj, msg),
		warn: (msgOrObj: string | Record<string, unknown>, msg?: string) => emit(target, "warn", msgOrObj, msg),
		error: (msgOrObj: string | Record<string, unknown>, msg?: string) => emit(target, "error", msgOrObj, msg),
		debug: (msgOrObj: string | Record<string, unknown>, msg?: string) => emit(target, "debug", msgOrObj, msg),
		child: (bindings: Record<string, unknown>) => wrapPino(target.child(redactSecrets(bindings))),
	};
}

/**
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" }).child({ component: "executor" });
 * logger.info({ signalId: 7, oid: 123 }, "order resting");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = {
		level: config.level,
		base: null,
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		options.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const target = destination
		? pino(options, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(options);

	return wrapPino(target);
}

/** Logger that drops everything. Used by tests and by components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
