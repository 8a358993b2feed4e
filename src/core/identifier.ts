import { createHash, randomUUID } from "crypto";
import { MalformedIdentifierError } from "./errors";

export const IDENTIFIER_BYTES = 16;

/** An identifier as callers may pass it: 16 raw bytes or UUID text. */
export type IdentifierLike = Uint8Array | string;

// RFC 4122 URL namespace. Legacy text ids are hashed under it.
export const LEGACY_ID_NAMESPACE = "6ba7b811-9dad-11d1-80b4-00c04fd430c8";

const HYPHENATED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const COMPACT = /^[0-9a-f]{32}$/i;

export function newIdentifier(): Buffer {
	return parseIdentifier(randomUUID());
}

/**
 * Parses UUID text, hyphenated or as 32 hex digits.
 * @throws MalformedIdentifierError for anything else
 */
export function parseIdentifier(text: string): Buffer {
	const trimmed = text.trim();
	if (HYPHENATED.test(trimmed)) {
		return Buffer.from(trimmed.replace(/-/g, ""), "hex");
	}
	if (COMPACT.test(trimmed)) {
		return Buffer.from(trimmed, "hex");
	}
	throw new MalformedIdentifierError(`"${text}" is not a UUID`);
}

export function tryParseIdentifier(text: string): Buffer | null {
	const trimmed = text.trim();
	if (HYPHENATED.test(trimmed) || COMPACT.test(trimmed)) {
		return parseIdentifier(trimmed);
	}
	return null;
}

export function formatIdentifier(id: Uint8Array): string {
	const hex = Buffer.from(id).toString("hex");
	return [
		hex.slice(0, 8),
		hex.slice(8, 12),
		hex.slice(12, 16),
		hex.slice(16, 20),
		hex.slice(20),
	].join("-");
}

export function isIdentifier(value: unknown): value is Uint8Array {
	return value instanceof Uint8Array && value.byteLength === IDENTIFIER_BYTES;
}

/**
 * Normalizes caller input to a 16 byte Buffer.
 * @throws MalformedIdentifierError on a wrong byte length or non-UUID text
 */
export function toIdentifier(input: IdentifierLike): Buffer {
	if (typeof input === "string") {
		return parseIdentifier(input);
	}
	if (input.byteLength !== IDENTIFIER_BYTES) {
		throw new MalformedIdentifierError(
			`expected ${IDENTIFIER_BYTES} bytes, got ${input.byteLength}`,
		);
	}
	return Buffer.isBuffer(input) ? input : Buffer.from(input);
}

/**
 * Name-based UUID (version 5, SHA-1) of `name` under `namespace`.
 */
export function nameIdentifier(name: string, namespace: string = LEGACY_ID_NAMESPACE): Buffer {
	const digest = createHash("sha1")
		.update(parseIdentifier(namespace))
		.update(name, "utf8")
		.digest();
	const id = Buffer.from(digest.subarray(0, IDENTIFIER_BYTES));
	id[6] = ((id[6] ?? 0) & 0x0f) | 0x50;
	id[8] = ((id[8] ?? 0) & 0x3f) | 0x80;
	return id;
}

/**
 * Re-keys a generation 1 text id. UUID text keeps its own bytes; any other
 * text gets its name-based UUID, so equal text always yields equal bytes.
 */
export function legacyIdentifier(text: string): Buffer {
	return tryParseIdentifier(text) ?? nameIdentifier(text);
}
