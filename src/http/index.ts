export {
	AuthRequirement,
	BodyEncoding,
	type HttpMethod,
	type HttpTransport,
	type QueryPair,
	type QueryValue,
	type RequestSpec,
	type ResponseEnvelope,
	type TransportRequest,
	type TransportResponse,
} from "./types.js";
export {
	type RequestSpecInit,
	buildUrl,
	encodeBody,
	encodeQuery,
	requestSpec,
	requiresAuth,
} from "./request-spec.js";
export { FetchTransport, responseEnvelope } from "./transport.js";
export {
	type PipelineError,
	type RequestPipelineOptions,
	RequestPipeline,
} from "./request-pipeline.js";
