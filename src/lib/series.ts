import { MalformedSampleError } from "./errors";
import type { ReportRow } from "./types";

/**
 * One sample in a series.
 */
export type SeriesPoint = Readonly<{
	time: Date;
	value: number;
}>;

/**
 * Column of a data frame. Times are epoch milliseconds.
 */
export type Field =
	| Readonly<{ name: string; type: "time"; values: readonly number[] }>
	| Readonly<{ name: string; type: "number"; values: readonly number[] }>;

/**
 * Labeled series as parallel time and value columns.
 */
export type DataFrame = Readonly<{
	name: string;
	fields: readonly [Field, Field];
}>;

/**
 * Result of mapping report rows, with the count of hits values that were
 * not numbers and became zero.
 */
export type MappedSeries = Readonly<{
	points: SeriesPoint[];
	defaultedValues: number;
}>;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses a report start time, integer milliseconds since epoch.
 *
 * @param text Raw startdatetime value.
 * @returns Parsed time, or undefined when the text isn't an integer.
 */
export function parseStartTime(text: string): Date | undefined {
	if (!INTEGER.test(text)) {
		return undefined;
	}
	const time = new Date(Number(text));
	return Number.isNaN(time.getTime()) ? undefined : time;
}

/**
 * Parses a report hits value. "N/A" and any other non-number read as zero.
 *
 * @param text Raw hits value.
 * @returns Parsed number, or undefined when not a decimal literal.
 */
export function parseHits(text: string): number | undefined {
	if (!DECIMAL.test(text)) {
		return undefined;
	}
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}

/**
 * Maps report rows to a series in row order. Rows are not re-sorted.
 *
 * @param rows Report rows as returned by the API.
 * @returns Series points and the number of defaulted hits values.
 * @throws {MalformedSampleError} When any row's start time is not an integer.
 */
export function mapReportRows(rows: readonly ReportRow[]): MappedSeries {
	let defaultedValues = 0;
	const points = rows.map((row, i): SeriesPoint => {
		const time = parseStartTime(row.startdatetime);
		if (time === undefined) {
			throw new MalformedSampleError(i, row.startdatetime);
		}
		const hits = parseHits(row.hits);
		if (hits === undefined) {
			defaultedValues++;
		}
		return { time, value: hits ?? 0 };
	});
	return { points, defaultedValues };
}

/**
 * Builds the frame emitted for one query.
 *
 * @param label Series label.
 * @param points Series points.
 * @returns Frame named "response" with time and value fields.
 */
export function toDataFrame(
	label: string,
	points: readonly SeriesPoint[],
): DataFrame {
	return {
		name: "response",
		fields: [
			{ name: "time", type: "time", values: points.map((p) => p.time.getTime()) },
			{ name: label, type: "number", values: points.map((p) => p.value) },
		],
	};
}
