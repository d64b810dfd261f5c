/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Log objects may carry `bigint` deltas and sqrt prices; they are rendered as
 * decimal strings so every sink sees the same representation.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	trace(msg: string): void;
	trace(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── bigint serializer ───────────────────────────────────────────────

// `seen` holds the current ancestor chain only, so shared references still render.
function normalizeValue(value: unknown, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object") return value;
	if (seen.has(value)) return "[Circular]";
	if (Array.isArray(value)) {
		seen.add(value);
		const items = value.map((item) => normalizeValue(item, seen));
		seen.delete(value);
		return items;
	}
	if (Object.getPrototypeOf(value) === Object.prototype) {
		seen.add(value);
		const out: Record<string, unknown> = {};
		for (const [key, inner] of Object.entries(value)) {
			out[key] = normalizeValue(inner, seen);
		}
		seen.delete(value);
		return out;
	}
	return value;
}

function normalizeBigInts(obj: object): Record<string, unknown> {
	const seen = new WeakSet<object>([obj]);
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		out[key] = normalizeValue(value, seen);
	}
	return out;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "trace" | "debug" | "info" | "warn" | "error";

function forward(
	pinoLogger: pino.Logger,
	method: PinoMethod,
	msgOrObj: unknown,
	msg?: string,
): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[method](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		pinoLogger[method](normalizeBigInts(msgOrObj), msg ?? "");
	} else {
		pinoLogger[method](String(msgOrObj));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "trace", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(normalizeBigInts(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ poolId, hooks: 3 }, "fan-out complete");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const sink = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				sink.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** Logger that discards everything. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
