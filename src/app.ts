import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { basicAuth } from "hono/basic-auth";
import type { TrafficDatasource } from "./datasource/TrafficDatasource";
import type { AppConfig } from "./lib/config";
import { ConfigurationError, extractErrorInfo } from "./lib/errors";
import { checkHealth, healthResponse } from "./lib/health";
import type { Logger } from "./lib/logger";
import { QueryDataRequestSchema } from "./lib/types";

type Variables = { logger: Logger };

/**
 * Dependencies of the HTTP app.
 */
export type AppDeps = Readonly<{
	config: AppConfig;
	datasource: TrafficDatasource;
	logger: Logger;
}>;

/**
 * Creates the HTTP app: batch queries and a health probe.
 *
 * @param deps Configuration, datasource and root logger.
 * @returns Hono app.
 */
export function createApp(deps: AppDeps) {
	const { config, datasource } = deps;
	const app = new Hono<{ Variables: Variables }>();

	// Request-scoped logger
	app.use("*", async (c, next) => {
		c.set(
			"logger",
			deps.logger.child("http").withContext({ request_id: randomUUID() }),
		);
		await next();
	});

	if (config.basicAuth.enabled) {
		app.use(
			"*",
			basicAuth({
				username: config.basicAuth.username,
				password: config.basicAuth.password,
				realm: "Traffic Report Datasource",
			}),
		);
	}

	app.get("/", (c) => c.text("Traffic report datasource\n"));

	app.post("/api/query", async (c) => {
		const logger = c.var.logger;
		const body: unknown = await c.req.json().catch(() => null);
		const parsed = QueryDataRequestSchema.safeParse(body);
		if (!parsed.success) {
			logger.warn("Rejected query request", {
				issues: parsed.error.issues.length,
			});
			return c.json(
				{ error: "Invalid request body", details: parsed.error.issues },
				400,
			);
		}

		const signal = AbortSignal.any([
			c.req.raw.signal,
			AbortSignal.timeout(config.queryTimeoutMs),
		]);

		try {
			const response = await datasource.queryData(
				{
					settings: parsed.data.settings ?? config.credentials,
					queries: parsed.data.queries,
				},
				signal,
			);
			logger.info("Query batch completed", {
				query_count: parsed.data.queries.length,
			});
			return c.json(response);
		} catch (error) {
			if (error instanceof ConfigurationError) {
				logger.error("Query batch rejected", error.toStructuredData());
				return c.json(
					{ error: error.message, errorCode: error.code, issues: error.issues },
					400,
				);
			}
			throw error;
		}
	});

	app.get("/api/health", async (c) => {
		const health = await checkHealth(
			datasource,
			config.credentials,
			config.healthCheckTimeoutMs,
			c.req.raw.signal,
		);
		return healthResponse(health);
	});

	app.notFound((c) => c.text("Not Found", 404));

	app.onError((error, c) => {
		const info = extractErrorInfo(error);
		c.var.logger.error("Unhandled error", {
			error_code: info.code,
			error_message: info.message,
		});
		return c.json({ error: info.message, errorCode: info.code }, 500);
	});

	return app;
}
