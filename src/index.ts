import { serve } from "@hono/node-server";
import { ReportingClient } from "./akamai/client";
import { createApp } from "./app";
import { TrafficDatasource } from "./datasource/TrafficDatasource";
import { loggerConfigOf, parseConfig } from "./lib/config";
import { createLogger } from "./lib/logger";

const bootLogger = createLogger("traffic_report");
const config = parseConfig(process.env, bootLogger.child("config"));
const loggerConfig = loggerConfigOf(config);
const logger = createLogger("traffic_report", loggerConfig);

const datasource = new TrafficDatasource({
	client: new ReportingClient({ loggerConfig }),
	logger,
});
const app = createApp({ config, datasource, logger });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
	logger.info("Listening", {
		port: info.port,
		log_level: config.logLevel,
		log_format: config.logFormat,
		basic_auth: config.basicAuth.enabled,
	});
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.on(signal, () => {
		logger.info("Shutting down", { signal });
		server.close();
	});
}
