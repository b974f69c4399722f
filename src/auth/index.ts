export {
	type ApiKeySet,
	type Authenticator,
	type AuthenticatorOptions,
	type SignedRequest,
	AuthScheme,
} from "./types.js";
export { Credentials, createCredentials, disposeCredentials, isDisposed } from "./credentials.js";
export { createAuthenticator } from "./factory.js";
