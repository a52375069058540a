// akamai-edgegrid ships no type declarations.
declare module "akamai-edgegrid" {
	interface EdgeGridRequest {
		path: string;
		method?: string;
		headers?: Record<string, string>;
		body?: string | object;
	}

	interface SignedRequest {
		url: string;
		method: string;
		headers: Record<string, string>;
		body?: string;
	}

	class EdgeGrid {
		constructor(
			clientToken: string,
			clientSecret: string,
			accessToken: string,
			host: string,
			debug?: boolean,
		);
		request: SignedRequest;
		auth(request: EdgeGridRequest): this;
	}

	export = EdgeGrid;
}
