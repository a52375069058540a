import { describe, expect, it } from "vitest";
import { defaultMetricName, parseZoneList } from "../zones";

describe("parseZoneList", () => {
	it("strips whitespace and drops empty segments", () => {
		expect(parseZoneList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
	});

	it("returns an empty list for empty input", () => {
		expect(parseZoneList("")).toEqual([]);
		expect(parseZoneList(undefined)).toEqual([]);
		expect(parseZoneList(" , ,, ")).toEqual([]);
	});

	it("removes tabs and newlines as well as spaces", () => {
		expect(parseZoneList("\tzone.one.example.net ,\n zone.two.example.net")).toEqual([
			"zone.one.example.net",
			"zone.two.example.net",
		]);
	});

	it("keeps duplicates and order", () => {
		expect(parseZoneList("b,a,b")).toEqual(["b", "a", "b"]);
	});
});

describe("defaultMetricName", () => {
	it("appends hits to the raw zone string", () => {
		expect(defaultMetricName("a.example.net, b.example.net")).toBe(
			"a.example.net, b.example.net hits",
		);
	});
});
