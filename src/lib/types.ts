import z from "zod";

/**
 * Zod schema for reporting granularity, using the API's wire names.
 */
export const IntervalSchema = z.enum(["FIVE_MINUTES", "HOUR"]);

/**
 * Reporting granularity sent as the `interval` query parameter.
 */
export type Interval = z.infer<typeof IntervalSchema>;

/**
 * Named granularities: FINE is 5-minute buckets, COARSE is 1-hour buckets.
 */
export const Interval = {
	FINE: "FIVE_MINUTES",
	COARSE: "HOUR",
} as const satisfies Record<string, Interval>;

/**
 * Zod schema for the four EdgeGrid credential strings.
 * Host is stored bare: scheme prefix and trailing slashes are dropped.
 */
export const CredentialBundleSchema = z
	.object({
		clientSecret: z.string().min(1),
		host: z
			.string()
			.trim()
			.transform((h) => h.replace(/^https?:\/\//, "").replace(/\/+$/, ""))
			.pipe(z.string().min(1)),
		accessToken: z.string().min(1),
		clientToken: z.string().min(1),
	})
	.readonly();

/**
 * Credentials used to sign reporting API requests.
 */
export type CredentialBundle = z.infer<typeof CredentialBundleSchema>;

/**
 * Zod schema for the per-query model sent by the panel front end.
 */
export const QueryModelSchema = z.object({
	zoneNames: z.string().default(""),
	metricName: z.string().default(""),
	maxDataPoints: z.number().int().nonnegative().default(0),
	intervalMs: z.number().int().nonnegative().optional(),
	dataSourceId: z.number().int().nonnegative().optional(),
});

/**
 * Query model after defaults are applied.
 */
export type QueryModel = z.infer<typeof QueryModelSchema>;

/**
 * Zod schema for a query's time range. Accepts ISO strings or epoch millis.
 */
export const TimeRangeSchema = z
	.object({
		from: z.coerce.date(),
		to: z.coerce.date(),
	})
	.readonly();

/**
 * Time range carried beside a query's model.
 */
export type TimeRange = z.infer<typeof TimeRangeSchema>;

/**
 * Zod schema for one query in a batch. Time range and model stay raw so
 * that a bad one fails only its own result slot.
 */
export const DataQuerySchema = z.object({
	refId: z.string().min(1),
	timeRange: z.unknown(),
	model: z.unknown(),
});

/**
 * One query in a batch, keyed by refId.
 */
export type DataQuery = z.infer<typeof DataQuerySchema>;

/**
 * Zod schema for a batch request body.
 */
export const QueryDataRequestSchema = z.object({
	settings: z.unknown().optional(),
	queries: z.array(DataQuerySchema),
});

/**
 * A batch of queries plus the raw credential bundle they share.
 */
export type QueryDataRequest = z.infer<typeof QueryDataRequestSchema>;

/**
 * Zod schema for one report row. Both columns arrive as strings.
 */
export const ReportRowSchema = z
	.object({
		startdatetime: z.string(),
		hits: z.string(),
	})
	.readonly();

/**
 * One raw sample from the reporting API.
 */
export type ReportRow = z.infer<typeof ReportRowSchema>;

/**
 * Zod schema for report metadata. Informational only.
 */
export const ReportMetadataSchema = z
	.object({
		name: z.string().optional(),
		version: z.string().optional(),
		outputType: z.string().optional(),
		interval: z.string().optional(),
		start: z.string().optional(),
		end: z.string().optional(),
		availableDataEnds: z.string().optional(),
		objectType: z.string().optional(),
		objectIds: z.array(z.string()).optional(),
		rowCount: z.number().optional(),
	})
	.passthrough();

/**
 * Zod schema for a successful report-data response.
 */
export const ReportResponseSchema = z.object({
	data: z.array(ReportRowSchema),
	metadata: ReportMetadataSchema.optional(),
});

/**
 * Decoded report-data response.
 */
export type ReportResponse = z.infer<typeof ReportResponseSchema>;

/**
 * Zod schema for the API's problem-details error body.
 */
export const ReportErrorResponseSchema = z.object({
	type: z.string().optional(),
	title: z.string().optional(),
	instance: z.string().optional(),
	errors: z
		.array(
			z.object({
				title: z.string(),
				type: z.string().optional(),
			}),
		)
		.min(1),
});

/**
 * Decoded error response.
 */
export type ReportErrorResponse = z.infer<typeof ReportErrorResponseSchema>;
