import { createConsola, type LogObject } from "consola";
import { colors } from "consola/utils";

/**
 * Log severity levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Output format: json for structured logs, pretty for human-readable.
 */
export type LogFormat = "json" | "pretty";

/**
 * Key-value pairs attached to log entries.
 */
export type StructuredData = Record<string, unknown>;

/**
 * Structured logger with level methods, namespacing, and context.
 */
export interface Logger {
	debug(msg: string, data?: StructuredData): void;
	info(msg: string, data?: StructuredData): void;
	warn(msg: string, data?: StructuredData): void;
	error(msg: string, data?: StructuredData): void;

	/**
	 * Create child logger with namespaced tag.
	 *
	 * @param namespace Namespace appended to parent tag with colon separator.
	 * @returns New logger instance.
	 */
	child(namespace: string): Logger;

	/**
	 * Create logger with merged context data.
	 *
	 * @param ctx Context data merged into all log entries.
	 * @returns New logger instance.
	 */
	withContext(ctx: StructuredData): Logger;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
	/** Output format, defaults to pretty. */
	format?: LogFormat;

	/** Minimum log level, defaults to info. */
	level?: LogLevel;

	/** Line sink, defaults to console.log. */
	write?: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
	debug: colors.gray,
	info: colors.cyan,
	warn: colors.yellow,
	error: colors.red,
};

const LEVEL_ICONS: Record<LogLevel, string> = {
	debug: "●",
	info: "◆",
	warn: "▲",
	error: "✖",
};

/**
 * Narrow consola's log type to one of our levels.
 *
 * @param type Consola log type.
 * @returns Matching level, or undefined for types we don't emit.
 */
function toLevel(type: string): LogLevel | undefined {
	return type === "debug" ||
		type === "info" ||
		type === "warn" ||
		type === "error"
		? type
		: undefined;
}

/**
 * Split consola args into message and structured data.
 *
 * @param args Raw consola arguments.
 * @returns Message text and optional data object.
 */
function splitArgs(args: unknown[]): { msg: string; data?: StructuredData } {
	const [first, second] = args;
	const msg = typeof first === "string" ? first : String(first);
	const data =
		second !== null && typeof second === "object" && !Array.isArray(second)
			? Object.fromEntries(Object.entries(second))
			: undefined;
	return { msg, data };
}

/**
 * Format current time as HH:MM:SS.
 */
function formatTime(): string {
	const now = new Date();
	return `${String(now.getHours()).padStart(2, "0")}:${String(now.getMinutes()).padStart(2, "0")}:${String(now.getSeconds()).padStart(2, "0")}`;
}

/**
 * Format value for display in logs.
 *
 * @param v Value to format.
 * @returns Formatted string representation.
 */
function formatValue(v: unknown): string {
	if (typeof v === "string") return v;
	if (typeof v === "number" || typeof v === "boolean") return String(v);
	return JSON.stringify(v);
}

/**
 * Format structured data as key=value pairs.
 *
 * @param data Structured data object.
 * @returns Formatted string with colored key-value pairs.
 */
function formatData(data: StructuredData): string {
	return Object.entries(data)
		.map(([k, v]) => `${colors.dim(k)}=${colors.white(formatValue(v))}`)
		.join(" ");
}

/**
 * Create pretty console reporter for human-readable logs.
 *
 * @param minLevel Minimum log level to output.
 * @param write Line sink.
 * @returns Reporter object with log method.
 */
function createPrettyReporter(
	minLevel: LogLevel,
	write: (line: string) => void,
) {
	const minLevelNum = LEVELS[minLevel];

	return {
		log(logObj: LogObject) {
			const level = toLevel(logObj.type);
			if (level === undefined || LEVELS[level] < minLevelNum) return;

			const { msg, data } = splitArgs(logObj.args);
			const time = colors.dim(formatTime());
			const levelBadge = LEVEL_COLORS[level](
				`${LEVEL_ICONS[level]} ${level.toUpperCase().padEnd(5)}`,
			);
			const tag = colors.dim(logObj.tag || "app");
			const suffix = data ? ` ${formatData(data)}` : "";

			write(`${time} ${levelBadge} ${tag} ${msg}${suffix}`);
		},
	};
}

/**
 * Create JSON reporter for structured logs.
 *
 * @param minLevel Minimum log level to output.
 * @param write Line sink.
 * @returns Reporter object with log method.
 */
function createJsonReporter(
	minLevel: LogLevel,
	write: (line: string) => void,
) {
	const minLevelNum = LEVELS[minLevel];

	return {
		log(logObj: LogObject) {
			const level = toLevel(logObj.type);
			if (level === undefined || LEVELS[level] < minLevelNum) return;

			const [logger, ...namespaceParts] = (logObj.tag || "app").split(":");
			const namespace =
				namespaceParts.length > 0 ? namespaceParts.join(":") : undefined;
			const { msg, data } = splitArgs(logObj.args);

			write(
				JSON.stringify({
					ts: new Date().toISOString(),
					logger,
					...(namespace && { namespace }),
					level,
					msg,
					...data,
				}),
			);
		},
	};
}

// Consola log levels: 0=silent, 1=error, 2=warn, 3=info, 4=debug, 5=trace
const CONSOLA_LEVELS: Record<LogLevel, number> = {
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
};

/**
 * Create logger instance with specified name and config.
 *
 * @param name Logger name, normalized to lowercase with underscores.
 * @param config Logger configuration.
 * @returns Configured logger instance.
 */
export function createLogger(name: string, config: LoggerConfig = {}): Logger {
	const format = config.format ?? "pretty";
	const level = config.level ?? "info";
	const write = config.write ?? ((line: string) => console.log(line));

	const reporter =
		format === "json"
			? createJsonReporter(level, write)
			: createPrettyReporter(level, write);

	const consola = createConsola({
		level: CONSOLA_LEVELS[level],
		reporters: [reporter],
		// Identical lines (e.g. per-query warnings in a batch) are all kept
		throttle: 0,
	});

	function makeLogger(tag: string, baseContext: StructuredData = {}): Logger {
		const instance = consola.withTag(tag);

		const mergeData = (data?: StructuredData): StructuredData | undefined => {
			if (!data && Object.keys(baseContext).length === 0) return undefined;
			if (!data) return baseContext;
			return { ...baseContext, ...data };
		};

		return {
			debug: (msg, data) => instance.debug(msg, mergeData(data)),
			info: (msg, data) => instance.info(msg, mergeData(data)),
			warn: (msg, data) => instance.warn(msg, mergeData(data)),
			error: (msg, data) => instance.error(msg, mergeData(data)),
			child: (ns) => makeLogger(`${tag}:${ns}`, baseContext),
			withContext: (ctx) => makeLogger(tag, { ...baseContext, ...ctx }),
		};
	}

	const normalizedName = name.toLowerCase().replace(/[ -]/g, "_");
	return makeLogger(normalizedName);
}
