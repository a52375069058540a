/**
 * Error codes for categorization and alerting.
 */
export const ErrorCode = {
	// Config
	CONFIG_INVALID: "CONFIG_INVALID",
	CONFIG_PARSE_ERROR: "CONFIG_PARSE_ERROR",

	// Query validation
	VALIDATION_ERROR: "VALIDATION_ERROR",
	NO_ZONES_SPECIFIED: "NO_ZONES_SPECIFIED",
	WINDOW_BEFORE_RETENTION_HORIZON: "WINDOW_BEFORE_RETENTION_HORIZON",

	// Reporting API
	TRANSPORT_ERROR: "TRANSPORT_ERROR",
	REMOTE_REJECTION: "REMOTE_REJECTION",
	MALFORMED_RESPONSE: "MALFORMED_RESPONSE",
	MALFORMED_SAMPLE: "MALFORMED_SAMPLE",

	// Timeout
	TIMEOUT: "TIMEOUT",

	// Unknown
	UNKNOWN: "UNKNOWN",
} as const;

/**
 * Error code type.
 */
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error context type.
 */
type ErrorContext = Record<string, unknown>;

/**
 * TrafficReportError options.
 */
type TrafficReportErrorOptions = ErrorOptions & {
	context?: ErrorContext;
};

/**
 * Base error class with cause chaining, error codes, and structured logging support.
 */
export class TrafficReportError extends Error {
	readonly code: ErrorCode;
	readonly context: ErrorContext;
	readonly timestamp: string;

	/**
	 * Create a TrafficReportError.
	 *
	 * @param message Error message.
	 * @param code Error code.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		code: ErrorCode,
		options?: TrafficReportErrorOptions,
	) {
		super(message, options);

		// Fix prototype chain for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);

		this.name = this.constructor.name;
		this.code = code;
		this.context = options?.context ?? {};
		this.timestamp = new Date().toISOString();

		if (options?.cause instanceof Error) {
			this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
		}
	}

	/**
	 * Convert to structured data for logging.
	 *
	 * @returns Structured error context.
	 */
	toStructuredData(): ErrorContext {
		return {
			error_code: this.code,
			error_message: this.message,
			error_name: this.name,
			...this.context,
		};
	}
}

/**
 * Credential bundle or environment configuration could not be decoded.
 * Fails a whole batch since no request can be signed.
 */
export class ConfigurationError extends TrafficReportError {
	readonly issues?: Array<{ path: string; message: string }>;

	/**
	 * Create a ConfigurationError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		options?: TrafficReportErrorOptions & {
			issues?: Array<{ path: string; message: string }>;
		},
	) {
		const code = message.includes("parse")
			? ErrorCode.CONFIG_PARSE_ERROR
			: ErrorCode.CONFIG_INVALID;
		super(message, code, options);
		this.issues = options?.issues;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			...(this.issues && { validation_issues: this.issues }),
		};
	}
}

/**
 * Query model failed schema validation.
 */
export class ValidationError extends TrafficReportError {
	readonly field?: string;

	/**
	 * Create a ValidationError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		options?: TrafficReportErrorOptions & { field?: string },
	) {
		super(message, ErrorCode.VALIDATION_ERROR, options);
		this.field = options?.field;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			...(this.field && { field: this.field }),
		};
	}
}

/**
 * Query names no zones, either literally or after parsing.
 */
export class NoZonesSpecifiedError extends TrafficReportError {
	/**
	 * Create a NoZonesSpecifiedError.
	 *
	 * @param message User-facing prompt.
	 * @param options Error options.
	 */
	constructor(message: string, options?: TrafficReportErrorOptions) {
		super(message, ErrorCode.NO_ZONES_SPECIFIED, options);
	}
}

/**
 * Requested window ends before the oldest data the API retains.
 */
export class WindowBeforeRetentionHorizonError extends TrafficReportError {
	readonly oldestAvailable: Date;

	/**
	 * Create a WindowBeforeRetentionHorizonError.
	 *
	 * @param to Rounded window end.
	 * @param oldestAvailable Rounded retention cutoff.
	 */
	constructor(to: Date, oldestAvailable: Date) {
		super(
			"Time range is before available data",
			ErrorCode.WINDOW_BEFORE_RETENTION_HORIZON,
			{
				context: {
					window_end: to.toISOString(),
					oldest_available: oldestAvailable.toISOString(),
				},
			},
		);
		this.oldestAvailable = oldestAvailable;
	}
}

/**
 * Network failure reaching the reporting API.
 */
export class TransportError extends TrafficReportError {
	/**
	 * Create a TransportError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(message: string, options?: TrafficReportErrorOptions) {
		super(message, ErrorCode.TRANSPORT_ERROR, options);
	}
}

/**
 * Non-success HTTP status from the reporting API.
 */
export class RemoteRejectionError extends TrafficReportError {
	readonly statusCode: number;
	readonly statusLine: string;

	/**
	 * Create a RemoteRejectionError.
	 *
	 * @param message Best-effort message: first error title or the status line.
	 * @param statusCode HTTP status code.
	 * @param statusLine Status code and reason phrase.
	 * @param options Error options.
	 */
	constructor(
		message: string,
		statusCode: number,
		statusLine: string,
		options?: TrafficReportErrorOptions,
	) {
		super(message, ErrorCode.REMOTE_REJECTION, options);
		this.statusCode = statusCode;
		this.statusLine = statusLine;
	}

	override toStructuredData(): ErrorContext {
		return {
			...super.toStructuredData(),
			status_code: this.statusCode,
		};
	}
}

/**
 * Success response whose body is not the expected report shape.
 */
export class MalformedResponseError extends TrafficReportError {
	/**
	 * Create a MalformedResponseError.
	 *
	 * @param message Error message.
	 * @param options Error options.
	 */
	constructor(message: string, options?: TrafficReportErrorOptions) {
		super(message, ErrorCode.MALFORMED_RESPONSE, options);
	}
}

/**
 * Report row whose start time is not an integer millisecond timestamp.
 * Fails the whole query: a series without its time anchor is unusable.
 */
export class MalformedSampleError extends TrafficReportError {
	readonly rowIndex: number;
	readonly value: string;

	/**
	 * Create a MalformedSampleError.
	 *
	 * @param rowIndex Zero-based index of the offending row.
	 * @param value Raw start time text.
	 */
	constructor(rowIndex: number, value: string) {
		super(
			`Invalid sample start time at row ${rowIndex}: "${value}"`,
			ErrorCode.MALFORMED_SAMPLE,
			{ context: { row_index: rowIndex, raw_value: value } },
		);
		this.rowIndex = rowIndex;
		this.value = value;
	}
}

/**
 * Operation timeout or cancellation.
 */
export class TimeoutError extends TrafficReportError {
	readonly operation: string;

	/**
	 * Create a TimeoutError.
	 *
	 * @param operation Operation name.
	 * @param options Error options.
	 */
	constructor(operation: string, options?: TrafficReportErrorOptions) {
		super(`${operation} timed out or was cancelled`, ErrorCode.TIMEOUT, {
			...options,
			context: { ...options?.context, operation },
		});
		this.operation = operation;
	}
}

/**
 * Extract structured error info from any error type.
 *
 * @param error Error to extract info from.
 * @returns Structured error info.
 */
export function extractErrorInfo(error: unknown): {
	message: string;
	stack?: string;
	code: ErrorCode;
	context: ErrorContext;
} {
	if (error instanceof TrafficReportError) {
		return {
			message: error.message,
			stack: error.stack,
			code: error.code,
			context: error.context,
		};
	}

	if (error instanceof Error) {
		return {
			message: error.message,
			stack: error.stack,
			code: ErrorCode.UNKNOWN,
			context: {},
		};
	}

	return {
		message: String(error),
		code: ErrorCode.UNKNOWN,
		context: {},
	};
}
