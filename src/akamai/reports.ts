import { NoZonesSpecifiedError } from "../lib/errors";
import { type AlignedWindow, formatApiTime } from "../lib/time";
import type { Interval } from "../lib/types";

/**
 * Report-data endpoint of the DNS traffic (all properties) report, v2.
 */
export const REPORT_DATA_PATH =
	"/reporting-api/v1/reports/load-balancing-dns-traffic-all-properties/versions/2/report-data";

/** Report object type for traffic-managed domains. */
export const OBJECT_TYPE = "fpdomain";

/** Columns requested from the report. */
export const REPORT_METRICS = ["startdatetime", "hits"] as const;

/** Zone that cannot exist, used to probe credentials. */
export const HEALTH_CHECK_ZONE = "-fake-";

/** Error title the API returns for the health-check zone. */
export const HEALTH_CHECK_EXPECTED_TITLE = `Some of the requested objects are unauthorized: [${HEALTH_CHECK_ZONE}]`;

/**
 * JSON body of a report-data POST.
 */
export type ReportRequestBody = Readonly<{
	objectType: typeof OBJECT_TYPE;
	objectIds: readonly string[];
	metrics: typeof REPORT_METRICS;
}>;

/**
 * Unsigned request against the reporting API. Path includes the query string.
 */
export type ReportRequest =
	| Readonly<{ method: "POST"; path: string; body: ReportRequestBody }>
	| Readonly<{ method: "GET"; path: string }>;

/**
 * URL-escaped RFC3339 time for the start/end parameters.
 *
 * @param t Time to format.
 * @returns Escaped timestamp such as "2023-11-14T22%3A15%3A00Z".
 */
function urlTime(t: Date): string {
	return encodeURIComponent(formatApiTime(t));
}

/**
 * Builds the report-data path with its query string.
 *
 * @param window Aligned window.
 * @param interval Reporting interval.
 * @param objectIds Optional objectIds parameter (GET form only).
 * @returns Path and query string.
 */
export function reportDataPath(
	window: AlignedWindow,
	interval: Interval,
	objectIds?: string,
): string {
	const query = [
		`start=${urlTime(window.from)}`,
		`end=${urlTime(window.to)}`,
		`interval=${interval}`,
	];
	if (objectIds !== undefined) {
		query.push(`objectIds=${encodeURIComponent(objectIds)}`);
	}
	return `${REPORT_DATA_PATH}?${query.join("&")}`;
}

/**
 * Builds the hits report request for a set of zones.
 *
 * @param zones Zone identifiers, in the order the user gave them.
 * @param window Aligned window.
 * @param interval Reporting interval.
 * @returns POST request.
 * @throws {NoZonesSpecifiedError} When zones is empty.
 */
export function buildReportRequest(
	zones: readonly string[],
	window: AlignedWindow,
	interval: Interval,
): ReportRequest {
	if (zones.length === 0) {
		throw new NoZonesSpecifiedError("Enter one zone name");
	}
	return {
		method: "POST",
		path: reportDataPath(window, interval),
		body: {
			objectType: OBJECT_TYPE,
			objectIds: [...zones],
			metrics: REPORT_METRICS,
		},
	};
}

/**
 * Builds the credential probe: a GET for a zone no account can own.
 *
 * @param window Aligned window.
 * @param interval Reporting interval.
 * @returns GET request.
 */
export function buildHealthCheckRequest(
	window: AlignedWindow,
	interval: Interval,
): ReportRequest {
	return {
		method: "GET",
		path: reportDataPath(window, interval, HEALTH_CHECK_ZONE),
	};
}
