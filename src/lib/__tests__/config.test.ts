import { describe, expect, it } from "vitest";
import { createMockLogger, testCredentials } from "../../__tests__/fakes";
import { parseConfig, parseCredentials } from "../config";
import { ConfigurationError } from "../errors";

describe("parseConfig", () => {
	it("applies defaults", () => {
		expect(parseConfig({})).toEqual({
			port: 3000,
			logFormat: "pretty",
			logLevel: "info",
			queryTimeoutMs: 30_000,
			healthCheckTimeoutMs: 5_000,
			credentials: {
				clientSecret: undefined,
				host: undefined,
				accessToken: undefined,
				clientToken: undefined,
			},
			basicAuth: { enabled: false },
		});
	});

	it("reads values from the environment", () => {
		const config = parseConfig({
			PORT: "8080",
			LOG_FORMAT: "json",
			LOG_LEVEL: "debug",
			QUERY_TIMEOUT_MS: "1000",
			HEALTH_CHECK_TIMEOUT_MS: "250",
			AKAMAI_HOST: "akab-test.luna.example.net",
		});
		expect(config).toMatchObject({
			port: 8080,
			logFormat: "json",
			logLevel: "debug",
			queryTimeoutMs: 1000,
			healthCheckTimeoutMs: 250,
		});
		expect(config.credentials.host).toBe("akab-test.luna.example.net");
	});

	it("falls back on invalid values", () => {
		const config = parseConfig({
			PORT: "abc",
			LOG_LEVEL: "verbose",
			QUERY_TIMEOUT_MS: "-5",
		});
		expect(config.port).toBe(3000);
		expect(config.logLevel).toBe("info");
		expect(config.queryTimeoutMs).toBe(30_000);
	});

	it("enables basic auth only with both user and password", () => {
		expect(
			parseConfig({ BASIC_AUTH_USER: " admin ", BASIC_AUTH_PASSWORD: "test-password" })
				.basicAuth,
		).toEqual({ enabled: true, username: "admin", password: "test-password" });

		const logger = createMockLogger();
		expect(parseConfig({ BASIC_AUTH_USER: "admin" }, logger).basicAuth).toEqual({
			enabled: false,
		});
		expect(logger.warn).toHaveBeenCalledWith(
			"BASIC_AUTH_PASSWORD is missing - basic auth disabled",
		);
	});
});

describe("parseCredentials", () => {
	it("accepts a bundle object", () => {
		expect(parseCredentials({ ...testCredentials })).toEqual(testCredentials);
	});

	it("accepts JSON text", () => {
		expect(parseCredentials(JSON.stringify(testCredentials))).toEqual(
			testCredentials,
		);
	});

	it("strips scheme and trailing slash from the host", () => {
		const bundle = parseCredentials({
			...testCredentials,
			host: " https://akab-test.luna.example.net/ ",
		});
		expect(bundle.host).toBe("akab-test.luna.example.net");
	});

	it("rejects unparsable JSON", () => {
		expect(() => parseCredentials("{not json")).toThrow(ConfigurationError);
		try {
			parseCredentials("{not json");
		} catch (error) {
			expect(error).toMatchObject({ code: "CONFIG_PARSE_ERROR" });
		}
	});

	it("names the missing fields", () => {
		expect(() =>
			parseCredentials({ host: "akab-test.luna.example.net", clientToken: "c" }),
		).toThrow("Invalid credential bundle: check clientSecret, accessToken");
	});

	it("rejects a missing bundle", () => {
		expect(() => parseCredentials(undefined)).toThrow(ConfigurationError);
	});
});
