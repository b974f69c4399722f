import { createHmac } from "node:crypto";

export function hmacSha256Hex(secret: Buffer, message: string | Buffer): string {
	return createHmac("sha256", secret).update(message).digest("hex");
}

export function hmacSha256Base64(secret: Buffer, message: string | Buffer): string {
	return createHmac("sha256", secret).update(message).digest("base64");
}
