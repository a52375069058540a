import z from "zod";
import { ConfigurationError } from "./errors";
import type { LogFormat, Logger, LoggerConfig, LogLevel } from "./logger";
import { type CredentialBundle, CredentialBundleSchema } from "./types";

/**
 * Basic auth configuration state.
 */
export type BasicAuthConfig =
	| { readonly enabled: false }
	| {
			readonly enabled: true;
			readonly username: string;
			readonly password: string;
	  };

/**
 * Application configuration parsed from environment variables.
 */
export type AppConfig = {
	readonly port: number;
	readonly logFormat: LogFormat;
	readonly logLevel: LogLevel;
	readonly queryTimeoutMs: number;
	readonly healthCheckTimeoutMs: number;
	/** Default credential bundle, still raw: decoded per batch. */
	readonly credentials: Readonly<Record<string, string | undefined>>;
	readonly basicAuth: BasicAuthConfig;
};

/**
 * Environment variables read by parseConfig.
 */
export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Parses application configuration from environment variables.
 * Uses Zod for type coercion with sensible defaults.
 *
 * @param env Process environment.
 * @param logger Receives warnings about incomplete settings.
 * @returns Parsed application configuration.
 */
export function parseConfig(env: Env, logger?: Logger): AppConfig {
	const port = z.coerce
		.number()
		.int()
		.min(1)
		.max(65535)
		.catch(3000)
		.parse(env.PORT);
	const logFormat = z.enum(["json", "pretty"]).catch("pretty").parse(env.LOG_FORMAT);
	const logLevel = z
		.enum(["debug", "info", "warn", "error"])
		.catch("info")
		.parse(env.LOG_LEVEL);
	const queryTimeoutMs = z.coerce
		.number()
		.int()
		.positive()
		.catch(30_000)
		.parse(env.QUERY_TIMEOUT_MS);
	const healthCheckTimeoutMs = z.coerce
		.number()
		.int()
		.positive()
		.catch(5_000)
		.parse(env.HEALTH_CHECK_TIMEOUT_MS);

	return {
		port,
		logFormat,
		logLevel,
		queryTimeoutMs,
		healthCheckTimeoutMs,
		credentials: {
			clientSecret: env.AKAMAI_CLIENT_SECRET,
			host: env.AKAMAI_HOST,
			accessToken: env.AKAMAI_ACCESS_TOKEN,
			clientToken: env.AKAMAI_CLIENT_TOKEN,
		},
		basicAuth: parseBasicAuthConfig(
			env.BASIC_AUTH_USER,
			env.BASIC_AUTH_PASSWORD,
			logger,
		),
	};
}

/**
 * Logger settings taken from the app configuration.
 *
 * @param config Parsed configuration.
 * @returns Logger configuration.
 */
export function loggerConfigOf(config: AppConfig): LoggerConfig {
	return { format: config.logFormat, level: config.logLevel };
}

/**
 * Parses basic auth configuration from environment variables.
 * Logs warnings if configuration is incomplete.
 *
 * @param user BASIC_AUTH_USER environment variable.
 * @param password BASIC_AUTH_PASSWORD environment variable.
 * @param logger Receives the warnings.
 * @returns Basic auth configuration.
 */
function parseBasicAuthConfig(
	user: string | undefined,
	password: string | undefined,
	logger?: Logger,
): BasicAuthConfig {
	const hasUser = user !== undefined && user.trim() !== "";
	const hasPassword = password !== undefined && password.trim() !== "";

	if (hasUser && hasPassword) {
		return { enabled: true, username: user.trim(), password: password.trim() };
	}

	if (hasUser !== hasPassword) {
		const missing = hasUser ? "BASIC_AUTH_PASSWORD" : "BASIC_AUTH_USER";
		logger?.warn(`${missing} is missing - basic auth disabled`);
	}

	return { enabled: false };
}

/**
 * Decodes a credential bundle. Strings are read as JSON first.
 *
 * @param raw Bundle object or its JSON text.
 * @returns Validated credentials.
 * @throws {ConfigurationError} When the bundle cannot be decoded.
 */
export function parseCredentials(raw: unknown): CredentialBundle {
	let value = raw;
	if (typeof raw === "string") {
		try {
			value = JSON.parse(raw);
		} catch (error) {
			throw new ConfigurationError("Failed to parse credential bundle JSON", {
				cause: error instanceof Error ? error : undefined,
			});
		}
	}

	const result = CredentialBundleSchema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues.map((i) => ({
			path: i.path.join("."),
			message: i.message,
		}));
		const fields = [...new Set(issues.map((i) => i.path || "(root)"))];
		throw new ConfigurationError(
			`Invalid credential bundle: check ${fields.join(", ")}`,
			{ issues },
		);
	}
	return result.data;
}
