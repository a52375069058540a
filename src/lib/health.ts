import type {
	HealthCheckResult,
	TrafficDatasource,
} from "../datasource/TrafficDatasource";

/**
 * Health endpoint body.
 */
export type HealthResponse = HealthCheckResult & {
	timestamp: string;
	latency_ms: number;
};

/**
 * Runs the datasource probe under a deadline.
 *
 * @param datasource Datasource to probe.
 * @param settings Raw credential bundle.
 * @param timeoutMs Deadline for the probe.
 * @param signal Inbound request signal, combined with the deadline.
 * @returns Health check response.
 */
export async function checkHealth(
	datasource: TrafficDatasource,
	settings: unknown,
	timeoutMs: number,
	signal?: AbortSignal,
): Promise<HealthResponse> {
	const start = performance.now();
	const deadline = AbortSignal.timeout(timeoutMs);
	const result = await datasource.checkHealth(
		settings,
		signal ? AbortSignal.any([signal, deadline]) : deadline,
	);
	return {
		...result,
		timestamp: new Date().toISOString(),
		latency_ms: Math.round(performance.now() - start),
	};
}

/**
 * Build HTTP response from health check result.
 *
 * @param health Health check response.
 * @returns HTTP response with JSON body.
 */
export function healthResponse(health: HealthResponse): Response {
	const status = health.status === "healthy" ? 200 : 503;
	return new Response(JSON.stringify(health), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}
