import {
	firstErrorTitle,
	type ReportingClient,
	type ReportingResponse,
} from "../akamai/client";
import {
	buildHealthCheckRequest,
	buildReportRequest,
	HEALTH_CHECK_EXPECTED_TITLE,
} from "../akamai/reports";
import { parseCredentials } from "../lib/config";
import {
	ErrorCode,
	extractErrorInfo,
	NoZonesSpecifiedError,
	TimeoutError,
	TrafficReportError,
	ValidationError,
} from "../lib/errors";
import type { Logger } from "../lib/logger";
import { type DataFrame, mapReportRows, toDataFrame } from "../lib/series";
import { alignWindow, roundToInterval, selectInterval } from "../lib/time";
import {
	type CredentialBundle,
	type DataQuery,
	Interval,
	QueryModelSchema,
	type QueryDataRequest,
	TimeRangeSchema,
} from "../lib/types";
import { defaultMetricName, parseZoneList } from "../lib/zones";

const HEALTH_CHECK_WINDOW_MS = 5 * 60 * 1000;

/**
 * Outcome of one query, stored in the slot for its refId.
 */
export type QueryResult =
	| Readonly<{ status: "ok"; frames: DataFrame[] }>
	| Readonly<{ status: "error"; error: string; errorCode: ErrorCode }>;

/**
 * Results of a batch, one slot per refId.
 */
export type QueryDataResponse = Readonly<{
	results: Record<string, QueryResult>;
}>;

/**
 * Health check outcome.
 */
export type HealthCheckResult = Readonly<{
	status: "healthy" | "unhealthy";
	message: string;
	error_code?: ErrorCode;
}>;

/**
 * Dependencies of TrafficDatasource.
 */
export type TrafficDatasourceConfig = Readonly<{
	client: ReportingClient;
	logger: Logger;
	/** Evaluation time for retention and health windows. */
	now?: () => Date;
}>;

/**
 * Turns panel queries into report requests and report rows into series.
 * Every query owns its own derived state; a failure fills only its slot.
 */
export class TrafficDatasource {
	private readonly client: ReportingClient;
	private readonly logger: Logger;
	private readonly now: () => Date;

	constructor(config: TrafficDatasourceConfig) {
		this.client = config.client;
		this.logger = config.logger.child("datasource");
		this.now = config.now ?? (() => new Date());
	}

	/**
	 * Runs a batch of queries in order.
	 *
	 * @param request Raw credential bundle and queries.
	 * @param signal Cancels the batch; pending queries fail in their slots.
	 * @returns One result per refId.
	 * @throws {ConfigurationError} When the credential bundle cannot be decoded.
	 */
	async queryData(
		request: QueryDataRequest,
		signal?: AbortSignal,
	): Promise<QueryDataResponse> {
		const credentials = parseCredentials(request.settings);
		this.logger.info("Running query batch", {
			query_count: request.queries.length,
		});

		const entries: Array<[string, QueryResult]> = [];
		for (const query of request.queries) {
			entries.push([
				query.refId,
				await this.runQuery(query, credentials, signal),
			]);
		}
		// Own data properties only, so a refId like "__proto__" keeps its slot
		return { results: Object.fromEntries(entries) };
	}

	/**
	 * Runs one query, capturing any failure into its result.
	 *
	 * @param query Query with refId and time range.
	 * @param credentials Decoded credential bundle.
	 * @param signal Cancels the request.
	 * @returns Frames on success, message and code on failure.
	 */
	async runQuery(
		query: DataQuery,
		credentials: CredentialBundle,
		signal?: AbortSignal,
	): Promise<QueryResult> {
		const logger = this.logger.withContext({ ref_id: query.refId });
		try {
			const frame = await this.executeQuery(query, credentials, logger, signal);
			return { status: "ok", frames: [frame] };
		} catch (error) {
			const info = extractErrorInfo(error);
			logger.warn(
				"Query failed",
				error instanceof TrafficReportError
					? error.toStructuredData()
					: { error_code: info.code, error_message: info.message },
			);
			return { status: "error", error: info.message, errorCode: info.code };
		}
	}

	private async executeQuery(
		query: DataQuery,
		credentials: CredentialBundle,
		logger: Logger,
		signal?: AbortSignal,
	): Promise<DataFrame> {
		if (signal?.aborted) {
			throw new TimeoutError("Query batch");
		}

		// Validate
		const parsed = QueryModelSchema.safeParse(query.model ?? {});
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new ValidationError(
				`Invalid query: ${issue.path.join(".") || "model"} ${issue.message}`,
				{ field: issue.path.join(".") },
			);
		}
		const model = parsed.data;
		const range = TimeRangeSchema.safeParse(query.timeRange);
		if (!range.success) {
			const issue = range.error.issues[0];
			const field = ["timeRange", ...issue.path].join(".");
			throw new ValidationError(`Invalid query: ${field} ${issue.message}`, {
				field,
			});
		}
		if (model.zoneNames.length === 0) {
			throw new NoZonesSpecifiedError("Enter zone names");
		}
		const zones = parseZoneList(model.zoneNames);
		if (zones.length === 0) {
			throw new NoZonesSpecifiedError("Enter one zone name");
		}

		const { from, to } = range.data;
		const interval = selectInterval(from, to, model.maxDataPoints);
		const window = alignWindow(from, to, interval, this.now());
		logger.info("Query window aligned", {
			zones: zones.length,
			interval,
			from: window.from.toISOString(),
			to: window.to.toISOString(),
			max_data_points: model.maxDataPoints,
		});

		// BuildRequest + Fetch
		const request = buildReportRequest(zones, window, interval);
		const report = await this.client.fetchReport(credentials, request, signal);

		// MapResponse
		const { points, defaultedValues } = mapReportRows(report.data);
		logger.info("Series mapped", { rows: points.length });
		if (defaultedValues > 0) {
			logger.debug("Non-numeric hits read as zero", {
				count: defaultedValues,
			});
		}

		// Emit
		const label =
			model.metricName.length > 0
				? model.metricName
				: defaultMetricName(model.zoneNames);
		return toDataFrame(label, points);
	}

	/**
	 * Probes the reporting API with a zone no account can own.
	 * Only a 403 naming that zone as unauthorized counts as healthy:
	 * it proves the host is reachable and the signature was accepted.
	 *
	 * @param settings Raw credential bundle.
	 * @param signal Cancels the probe.
	 * @returns Healthy or unhealthy with a message.
	 */
	async checkHealth(
		settings: unknown,
		signal?: AbortSignal,
	): Promise<HealthCheckResult> {
		const unhealthy = (message: string, code: ErrorCode): HealthCheckResult => {
			this.logger.error("Health check failed", { msg: message });
			return { status: "unhealthy", message, error_code: code };
		};

		let res: ReportingResponse;
		try {
			const credentials = parseCredentials(settings);
			const to = this.now();
			const from = new Date(to.getTime() - HEALTH_CHECK_WINDOW_MS);
			const window = {
				from: roundToInterval(from, Interval.FINE),
				to: roundToInterval(to, Interval.FINE),
			};
			res = await this.client.send(
				credentials,
				buildHealthCheckRequest(window, Interval.FINE),
				signal,
			);
		} catch (error) {
			const info = extractErrorInfo(error);
			return unhealthy(info.message, info.code);
		}

		this.logger.info("Health check response", {
			status: res.statusLine,
			expected: "403",
		});

		const title = firstErrorTitle(res.body);
		if (res.status !== 403) {
			return unhealthy(
				`Unexpected status code. Datasource failed: ${title ?? res.statusLine}`,
				ErrorCode.REMOTE_REJECTION,
			);
		}
		if (title === undefined) {
			return unhealthy(
				`Unexpected response format. Datasource failed: ${res.statusLine}`,
				ErrorCode.MALFORMED_RESPONSE,
			);
		}
		if (title !== HEALTH_CHECK_EXPECTED_TITLE) {
			return unhealthy(
				`Unexpected error type. Datasource failed: ${title}`,
				ErrorCode.REMOTE_REJECTION,
			);
		}

		return { status: "healthy", message: "Data source is working" };
	}
}
