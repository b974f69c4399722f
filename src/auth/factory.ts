import type { CredentialError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { BaseAuthenticator } from "./authenticator.js";
import { BybitAuthenticator } from "./bybit.js";
import { type Credentials, type SecretMaterial, claimCredentials } from "./credentials.js";
import { KucoinAuthenticator } from "./kucoin.js";
import { BinanceAuthenticator, MexcAuthenticator } from "./query-signature.js";
import type { AuthScheme, Authenticator, AuthenticatorOptions } from "./types.js";

type AuthenticatorClass = new (
	credentials: Credentials,
	material: SecretMaterial,
	options?: AuthenticatorOptions,
) => BaseAuthenticator;

const SCHEMES: Readonly<Record<AuthScheme, AuthenticatorClass>> = {
	binance: BinanceAuthenticator,
	mexc: MexcAuthenticator,
	bybit: BybitAuthenticator,
	kucoin: KucoinAuthenticator,
};

/**
 * Build the authenticator for a scheme, taking ownership of the credentials.
 * Fails with CredentialError on malformed, disposed or already-owned material.
 */
export function createAuthenticator(
	scheme: AuthScheme,
	credentials: Credentials,
	options: AuthenticatorOptions = {},
): Result<Authenticator, CredentialError> {
	const claim = claimCredentials(credentials, { requirePassphrase: scheme === "kucoin" });
	if (!claim.ok) return claim;
	return ok(new SCHEMES[scheme](credentials, claim.value, options));
}
