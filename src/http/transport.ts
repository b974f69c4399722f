/**
 * Default HttpTransport over the global fetch (undici's pooled agent on
 * Node 20). One instance can be shared by any number of pipelines.
 */

import type {
	HttpTransport,
	ResponseEnvelope,
	TransportRequest,
	TransportResponse,
} from "./types.js";

export class FetchTransport implements HttpTransport {
	async send(request: TransportRequest): Promise<TransportResponse> {
		const response = await fetch(request.url, {
			method: request.method,
			headers: { ...request.headers },
			...(request.body !== undefined && { body: request.body }),
			signal: AbortSignal.timeout(request.timeoutMs),
		});
		const body = new Uint8Array(await response.arrayBuffer());
		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key.toLowerCase()] = value;
		});
		return { status: response.status, headers, body };
	}
}

const decoder = new TextDecoder();

export function responseEnvelope(response: TransportResponse): ResponseEnvelope {
	const { status, headers, body } = response;
	return {
		status,
		headers,
		body,
		text: () => decoder.decode(body),
	};
}
