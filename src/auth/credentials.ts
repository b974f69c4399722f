/**
 * Opaque credential container — secrets never leak through toString,
 * JSON.stringify, Node.js inspect or the logger.
 *
 * Secret bytes live in Buffers held in a module-private WeakMap, so
 * `disposeCredentials` can zero them in place.
 */

import { inspect } from "node:util";
import { CredentialError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { ApiKeySet } from "./types.js";

/** @internal Unsealed view handed to exactly one authenticator. */
export interface SecretMaterial {
	readonly apiKey: string;
	readonly secret: Buffer;
	readonly passphrase: Buffer | undefined;
}

interface Sealed extends SecretMaterial {
	disposed: boolean;
}

const store = new WeakMap<Credentials, Sealed>();
const claimed = new WeakSet<Credentials>();

export class Credentials {
	readonly __opaque = true as const;

	private constructor() {}

	/** @internal */
	static seal(keys: ApiKeySet): Credentials {
		const credentials = new Credentials();
		store.set(credentials, {
			apiKey: keys.apiKey,
			secret: Buffer.from(keys.secret, "utf8"),
			passphrase: keys.passphrase === undefined ? undefined : Buffer.from(keys.passphrase, "utf8"),
			disposed: false,
		});
		return credentials;
	}

	toString(): string {
		return "[REDACTED]";
	}

	toJSON(): string {
		return "[REDACTED]";
	}

	[inspect.custom](): string {
		return "[REDACTED]";
	}
}

/**
 * Seals an API key set into opaque Credentials.
 *
 * @example
 * const credentials = createCredentials({ apiKey: "test-key", secret: "test-secret" });
 * console.log(credentials); // [REDACTED]
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	return Credentials.seal(keys);
}

/** Zero-fills the secret and passphrase bytes. Idempotent. */
export function disposeCredentials(credentials: Credentials): void {
	const sealed = store.get(credentials);
	if (sealed === undefined || sealed.disposed) return;
	sealed.secret.fill(0);
	sealed.passphrase?.fill(0);
	sealed.disposed = true;
}

export function isDisposed(credentials: Credentials): boolean {
	return store.get(credentials)?.disposed ?? true;
}

const WHITESPACE = new Set([0x09, 0x0a, 0x0d, 0x20]);
const HEADER_SAFE = /^[\x21-\x7e]+$/;

function hasSurroundingWhitespace(bytes: Buffer): boolean {
	const first = bytes[0];
	const last = bytes[bytes.length - 1];
	return (
		(first !== undefined && WHITESPACE.has(first)) || (last !== undefined && WHITESPACE.has(last))
	);
}

/**
 * @internal Validate and take ownership. Succeeds once per Credentials;
 * a rejected attempt does not consume them.
 */
export function claimCredentials(
	credentials: Credentials,
	options: { readonly requirePassphrase: boolean },
): Result<SecretMaterial, CredentialError> {
	const sealed = store.get(credentials);
	if (sealed === undefined) {
		return err(new CredentialError("Unknown credentials object"));
	}
	if (sealed.disposed) {
		return err(new CredentialError("Credentials have been disposed"));
	}
	if (claimed.has(credentials)) {
		return err(new CredentialError("Credentials are already owned by another authenticator"));
	}
	if (sealed.apiKey.length === 0) {
		return err(new CredentialError("API key must not be empty"));
	}
	if (!HEADER_SAFE.test(sealed.apiKey)) {
		return err(new CredentialError("API key contains characters not allowed in an HTTP header"));
	}
	if (sealed.secret.length === 0) {
		return err(new CredentialError("API secret must not be empty"));
	}
	if (hasSurroundingWhitespace(sealed.secret)) {
		return err(new CredentialError("API secret has leading or trailing whitespace"));
	}
	const missingPassphrase = sealed.passphrase === undefined || sealed.passphrase.length === 0;
	if (options.requirePassphrase && missingPassphrase) {
		return err(new CredentialError("A passphrase is required for this exchange"));
	}
	claimed.add(credentials);
	return ok(sealed);
}

/** @internal Live check used before each signature. */
export function checkUsable(credentials: Credentials): Result<void, CredentialError> {
	if (isDisposed(credentials)) {
		return err(new CredentialError("Credentials have been disposed"));
	}
	return ok(undefined);
}
