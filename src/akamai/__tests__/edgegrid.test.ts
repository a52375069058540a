import { describe, expect, it } from "vitest";
import { testCredentials } from "../../__tests__/fakes";
import { signRequest } from "../edgegrid";

const path =
	"/reporting-api/v1/reports/x/versions/2/report-data?start=2024-05-31T22%3A00%3A00Z&end=2024-05-31T23%3A00%3A00Z&interval=HOUR";
const body =
	'{"objectType":"fpdomain","objectIds":["a.example.net"],"metrics":["startdatetime","hits"]}';

const HEADER =
	/^EG1-HMAC-SHA256 client_token=akab-client-token;access_token=akab-access-token;timestamp=\d{8}T\d{2}:\d{2}:\d{2}\+0000;nonce=[0-9a-f-]{36};signature=[A-Za-z0-9+/]+=*$/;

describe("signRequest", () => {
	it("signs POST requests with the credential tokens", () => {
		expect(signRequest(testCredentials, { method: "POST", pathAndQuery: path, body })).toMatch(
			HEADER,
		);
	});

	it("signs GET requests without a body", () => {
		expect(signRequest(testCredentials, { method: "GET", pathAndQuery: path })).toMatch(HEADER);
	});

	it("uses a fresh nonce per request", () => {
		const nonceOf = (header: string) => /;nonce=([^;]+);/.exec(header)?.[1];
		const a = signRequest(testCredentials, { method: "GET", pathAndQuery: path });
		const b = signRequest(testCredentials, { method: "GET", pathAndQuery: path });
		expect(nonceOf(a)).toBeDefined();
		expect(nonceOf(a)).not.toBe(nonceOf(b));
	});
});
