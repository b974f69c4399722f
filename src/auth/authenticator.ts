/**
 * Shared authenticator behaviour: ownership, disposal and the
 * none / key-only / signed split. Schemes implement `signFull`.
 */

import { ConfigError, type CredentialError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { RequestSpec } from "../http/types.js";
import {
	type Credentials,
	type SecretMaterial,
	checkUsable,
	disposeCredentials,
} from "./credentials.js";
import type { AuthScheme, Authenticator, AuthenticatorOptions, SignedRequest } from "./types.js";

export abstract class BaseAuthenticator implements Authenticator {
	abstract readonly scheme: AuthScheme;
	abstract readonly apiKeyHeader: string;
	protected readonly material: SecretMaterial;
	protected readonly recvWindowMs: number | undefined;
	private readonly credentials: Credentials;

	constructor(
		credentials: Credentials,
		material: SecretMaterial,
		options: AuthenticatorOptions = {},
	) {
		this.credentials = credentials;
		this.material = material;
		this.recvWindowMs = options.recvWindowMs;
	}

	sign(
		spec: RequestSpec,
		timestampMs: number,
		body?: string,
	): Result<SignedRequest, CredentialError> {
		const usable = checkUsable(this.credentials);
		if (!usable.ok) return usable;

		switch (spec.auth) {
			case "none":
				return ok({ spec, headers: {}, query: spec.query, body, canonical: undefined });
			case "key":
				return ok({
					spec,
					headers: { [this.apiKeyHeader]: this.material.apiKey },
					query: spec.query,
					body,
					canonical: undefined,
				});
			case "sign":
				return ok(this.signFull(spec, Math.trunc(timestampMs), body));
		}
	}

	buildWsAuthMessage(_expiresMs: number): Result<string, ConfigError | CredentialError> {
		return err(new ConfigError(`The ${this.scheme} scheme has no WebSocket login frame`));
	}

	dispose(): void {
		disposeCredentials(this.credentials);
	}

	protected checkUsable(): Result<void, CredentialError> {
		return checkUsable(this.credentials);
	}

	protected abstract signFull(
		spec: RequestSpec,
		timestampMs: number,
		body: string | undefined,
	): SignedRequest;
}
