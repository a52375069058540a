/**
 * Parses the comma-separated zone string typed into a query.
 * All whitespace is removed, empty segments are dropped, order is kept.
 * Duplicates are passed through as-is.
 *
 * @param value Raw zone string from the query model.
 * @returns Zone identifiers, empty when none were given.
 */
export function parseZoneList(value: string | undefined): string[] {
	if (!value) {
		return [];
	}
	return value
		.replace(/\s+/g, "")
		.split(",")
		.filter((z) => z.length > 0);
}

/**
 * Default series label when the query has no metric name.
 *
 * @param zoneNames Raw zone string exactly as the user entered it.
 * @returns Label such as "example.akadns.net hits".
 */
export function defaultMetricName(zoneNames: string): string {
	return `${zoneNames} hits`;
}
