import {
	MalformedResponseError,
	RemoteRejectionError,
	TimeoutError,
	TransportError,
} from "../lib/errors";
import { createLogger, type Logger, type LoggerConfig } from "../lib/logger";
import {
	type CredentialBundle,
	ReportErrorResponseSchema,
	type ReportResponse,
	ReportResponseSchema,
} from "../lib/types";
import { signRequest } from "./edgegrid";
import type { ReportRequest } from "./reports";

/**
 * Configuration for ReportingClient.
 */
export type ReportingClientConfig = Readonly<{
	loggerConfig?: LoggerConfig;
	fetch?: typeof globalThis.fetch;
}>;

/**
 * Raw reply: status plus the body decoded as JSON when it is JSON.
 */
export type ReportingResponse = Readonly<{
	status: number;
	statusLine: string;
	ok: boolean;
	body: unknown;
}>;

/**
 * "403 Forbidden" style status line.
 *
 * @param res Fetch response.
 * @returns Status code and reason phrase.
 */
function statusLineOf(res: Response): string {
	return res.statusText ? `${res.status} ${res.statusText}` : String(res.status);
}

/**
 * Parses a body as JSON, leaving undefined when it isn't.
 *
 * @param text Body text.
 * @returns Decoded value or undefined.
 */
function tryParseJson(text: string): unknown {
	if (text.trim() === "") {
		return undefined;
	}
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return undefined;
	}
}

/**
 * First error title of a problem-details body.
 *
 * @param body Decoded error body.
 * @returns Title, or undefined when the body isn't the expected shape.
 */
export function firstErrorTitle(body: unknown): string | undefined {
	const result = ReportErrorResponseSchema.safeParse(body);
	return result.success ? result.data.errors[0].title : undefined;
}

/**
 * Sends signed requests to the reporting API.
 * One attempt per call: no retries, no batching.
 */
export class ReportingClient {
	private readonly fetchFn: typeof globalThis.fetch;
	private readonly logger: Logger;

	constructor(config: ReportingClientConfig = {}) {
		this.fetchFn = config.fetch ?? globalThis.fetch;
		this.logger = createLogger("reporting_api", config.loggerConfig);
	}

	/**
	 * Signs and sends one request.
	 *
	 * @param credentials Credential bundle.
	 * @param request Request to send.
	 * @param signal Cancels the call.
	 * @returns Status and decoded body.
	 * @throws {TimeoutError} When the signal aborts the call.
	 * @throws {TransportError} When the API cannot be reached.
	 */
	async send(
		credentials: CredentialBundle,
		request: ReportRequest,
		signal?: AbortSignal,
	): Promise<ReportingResponse> {
		const body =
			request.method === "POST" ? JSON.stringify(request.body) : undefined;
		const authorization = signRequest(credentials, {
			method: request.method,
			pathAndQuery: request.path,
			body,
		});
		const url = `https://${credentials.host}${request.path}`;

		this.logger.info("Sending report request", {
			method: request.method,
			path: request.path,
		});

		try {
			const res = await this.fetchFn(url, {
				method: request.method,
				headers: {
					Authorization: authorization,
					Accept: "application/json",
					...(body !== undefined && { "Content-Type": "application/json" }),
				},
				body,
				signal,
			});
			const text = await res.text();
			const statusLine = statusLineOf(res);
			this.logger.info("Report response received", { status: statusLine });
			return {
				status: res.status,
				statusLine,
				ok: res.ok,
				body: tryParseJson(text),
			};
		} catch (error) {
			if (signal?.aborted) {
				throw new TimeoutError("Reporting API request", {
					cause: error instanceof Error ? error : undefined,
				});
			}
			const msg = error instanceof Error ? error.message : String(error);
			this.logger.error("Reporting API communication error", { error: msg });
			throw new TransportError(
				`Reporting API communication error: ${msg}`,
				{ cause: error instanceof Error ? error : undefined },
			);
		}
	}

	/**
	 * Fetches report rows.
	 *
	 * @param credentials Credential bundle.
	 * @param request Report request from buildReportRequest.
	 * @param signal Cancels the call.
	 * @returns Decoded report.
	 * @throws {RemoteRejectionError} On a non-2xx status.
	 * @throws {MalformedResponseError} When a 2xx body is not a report.
	 */
	async fetchReport(
		credentials: CredentialBundle,
		request: ReportRequest,
		signal?: AbortSignal,
	): Promise<ReportResponse> {
		const res = await this.send(credentials, request, signal);

		if (!res.ok) {
			// E.g. "Some of the requested objects are unauthorized: [foo.example.com]"
			const message = firstErrorTitle(res.body) ?? res.statusLine;
			throw new RemoteRejectionError(message, res.status, res.statusLine);
		}

		const result = ReportResponseSchema.safeParse(res.body);
		if (!result.success) {
			throw new MalformedResponseError(
				`Unexpected report response format: ${res.statusLine}`,
				{
					context: {
						issues: result.error.issues.map((i) => ({
							path: i.path.join("."),
							message: i.message,
						})),
					},
				},
			);
		}

		this.logger.debug("Report decoded", {
			rows: result.data.data.length,
			interval: result.data.metadata?.interval,
		});
		return result.data;
	}
}
