/**
 * Store error kinds.
 * Every failure the store raises on purpose is a GraphStoreError; SQLite
 * errors that escape a migration step are wrapped as its `cause`.
 */

export type GraphStoreErrorKind =
	| "NotFound"
	| "DuplicateIdentifier"
	| "MalformedIdentifier"
	| "InvalidValue"
	| "MigrationFailed"
	| "UnsupportedGeneration";

export class GraphStoreError extends Error {
	readonly kind: GraphStoreErrorKind;

	constructor(kind: GraphStoreErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = `${kind}Error`;
		this.kind = kind;
	}
}

export class NotFoundError extends GraphStoreError {
	constructor(what: string) {
		super("NotFound", `${what} not found`);
	}
}

export class DuplicateIdentifierError extends GraphStoreError {
	readonly id: string;

	constructor(id: string) {
		super("DuplicateIdentifier", `Value ${id} already exists`);
		this.id = id;
	}
}

export class MalformedIdentifierError extends GraphStoreError {
	constructor(detail: string) {
		super("MalformedIdentifier", `Malformed identifier: ${detail}`);
	}
}

export class InvalidValueError extends GraphStoreError {
	constructor(detail: string) {
		super("InvalidValue", `Invalid value: ${detail}`);
	}
}

export class MigrationFailedError extends GraphStoreError {
	readonly version: number;

	constructor(version: number, message: string, options?: ErrorOptions) {
		super("MigrationFailed", `Migration to v${version} failed: ${message}`, options);
		this.version = version;
	}
}

export class UnsupportedGenerationError extends GraphStoreError {
	readonly generation: number;

	constructor(generation: number, newest: number) {
		super(
			"UnsupportedGeneration",
			`Store is at generation ${generation}, newer than the newest known generation ${newest}`,
		);
		this.generation = generation;
	}
}

export function isGraphStoreError(
	error: unknown,
	kind?: GraphStoreErrorKind,
): error is GraphStoreError {
	return error instanceof GraphStoreError && (kind === undefined || error.kind === kind);
}
