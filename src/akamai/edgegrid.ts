import EdgeGrid from "akamai-edgegrid";
import type { CredentialBundle } from "../lib/types";

/**
 * Request fields that take part in the signature.
 */
export type SignableRequest = Readonly<{
	method: "GET" | "POST";
	pathAndQuery: string;
	body?: string;
}>;

/**
 * Computes the EG1-HMAC-SHA256 Authorization header for a request.
 * Timestamp and nonce are fresh on every call.
 *
 * @param credentials Client and access tokens, client secret and host.
 * @param request Method, path with query, and body.
 * @returns Authorization header value.
 */
export function signRequest(
	credentials: CredentialBundle,
	request: SignableRequest,
): string {
	const signer = new EdgeGrid(
		credentials.clientToken,
		credentials.clientSecret,
		credentials.accessToken,
		credentials.host,
	);
	const { headers } = signer.auth({
		path: request.pathAndQuery,
		method: request.method,
		body: request.body ?? "",
	}).request;
	return headers.Authorization;
}
