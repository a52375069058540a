import { describe, expect, it } from "vitest";
import {
	createFetchMock,
	errorResponse,
	jsonResponse,
	reportResponse,
	silentLoggerConfig,
	testCredentials,
	textResponse,
} from "../../__tests__/fakes";
import {
	MalformedResponseError,
	RemoteRejectionError,
	TimeoutError,
	TransportError,
} from "../../lib/errors";
import { Interval } from "../../lib/types";
import { ReportingClient, firstErrorTitle } from "../client";
import { buildHealthCheckRequest, buildReportRequest } from "../reports";

const window = {
	from: new Date("2023-11-14T22:15:00Z"),
	to: new Date("2023-11-14T23:00:00Z"),
};
const request = buildReportRequest(["a.example.net"], window, Interval.FINE);

function clientWith(fetchMock: typeof globalThis.fetch) {
	return new ReportingClient({ fetch: fetchMock, loggerConfig: silentLoggerConfig });
}

describe("ReportingClient.send", () => {
	it("posts a signed JSON body to the configured host", async () => {
		const fetchMock = createFetchMock(reportResponse([]));
		await clientWith(fetchMock).send(testCredentials, request);

		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe(`https://akab-test.luna.example.net${request.path}`);
		expect(init?.method).toBe("POST");
		expect(init?.body).toBe(
			'{"objectType":"fpdomain","objectIds":["a.example.net"],"metrics":["startdatetime","hits"]}',
		);
		const headers = new Headers(init?.headers);
		expect(headers.get("Content-Type")).toBe("application/json");
		expect(headers.get("Authorization")).toMatch(
			/^EG1-HMAC-SHA256 client_token=akab-client-token;access_token=akab-access-token;timestamp=\d{8}T\d{2}:\d{2}:\d{2}\+0000;nonce=[0-9a-f-]{36};signature=[A-Za-z0-9+/]+=*$/,
		);
	});

	it("sends GET requests without a body", async () => {
		const fetchMock = createFetchMock(textResponse(403, "Forbidden", ""));
		const res = await clientWith(fetchMock).send(
			testCredentials,
			buildHealthCheckRequest(window, Interval.FINE),
		);

		const [, init] = fetchMock.mock.calls[0];
		expect(init?.method).toBe("GET");
		expect(init?.body).toBeUndefined();
		expect(new Headers(init?.headers).get("Content-Type")).toBeNull();
		expect(res).toEqual({
			status: 403,
			statusLine: "403 Forbidden",
			ok: false,
			body: undefined,
		});
	});

	it("wraps network failures", async () => {
		const fetchMock = createFetchMock();
		fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

		const result = clientWith(fetchMock).send(testCredentials, request);
		await expect(result).rejects.toThrow(TransportError);
		await expect(result).rejects.toThrow(
			"Reporting API communication error: fetch failed",
		);
	});

	it("reports cancellation as a timeout", async () => {
		const controller = new AbortController();
		controller.abort();
		const fetchMock = createFetchMock();
		fetchMock.mockRejectedValueOnce(new Error("This operation was aborted"));

		await expect(
			clientWith(fetchMock).send(testCredentials, request, controller.signal),
		).rejects.toThrow(TimeoutError);
		expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
	});
});

describe("ReportingClient.fetchReport", () => {
	it("returns decoded rows and metadata", async () => {
		const fetchMock = createFetchMock(
			reportResponse([{ startdatetime: "1700000000000", hits: "N/A" }]),
		);
		const report = await clientWith(fetchMock).fetchReport(testCredentials, request);

		expect(report.data).toEqual([{ startdatetime: "1700000000000", hits: "N/A" }]);
		expect(report.metadata?.rowCount).toBe(1);
	});

	it("uses the first error title for a rejection", async () => {
		const fetchMock = createFetchMock(
			errorResponse(
				403,
				"Forbidden",
				"Some of the requested objects are unauthorized: [a.example.net]",
			),
		);
		const result = clientWith(fetchMock).fetchReport(testCredentials, request);

		await expect(result).rejects.toThrow(RemoteRejectionError);
		await expect(result).rejects.toMatchObject({
			message: "Some of the requested objects are unauthorized: [a.example.net]",
			statusCode: 403,
			statusLine: "403 Forbidden",
			code: "REMOTE_REJECTION",
		});
	});

	it("falls back to the status line for other bodies", async () => {
		const html = createFetchMock(textResponse(502, "Bad Gateway", "<html>"));
		await expect(
			clientWith(html).fetchReport(testCredentials, request),
		).rejects.toThrow("502 Bad Gateway");

		const noEntries = createFetchMock(
			jsonResponse(400, "Bad Request", { title: "Bad request", errors: [] }),
		);
		await expect(
			clientWith(noEntries).fetchReport(testCredentials, request),
		).rejects.toThrow("400 Bad Request");
	});

	it("rejects a success body that is not a report", async () => {
		const fetchMock = createFetchMock(jsonResponse(200, "OK", { rows: [] }));
		await expect(
			clientWith(fetchMock).fetchReport(testCredentials, request),
		).rejects.toThrow(MalformedResponseError);
	});
});

describe("firstErrorTitle", () => {
	it("reads the first entry", () => {
		expect(
			firstErrorTitle({ errors: [{ title: "first" }, { title: "second" }] }),
		).toBe("first");
	});

	it("returns undefined for other shapes", () => {
		expect(firstErrorTitle(undefined)).toBeUndefined();
		expect(firstErrorTitle({ errors: [] })).toBeUndefined();
		expect(firstErrorTitle({ title: "top-level only" })).toBeUndefined();
	});
});
