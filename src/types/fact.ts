import type { IdentifierLike } from "../core/identifier";
import type { StoredValue } from "../core/typedValue";

/**
 * A value together with the links leaving it, written in one transaction by
 * `GraphDB.store`. Nested facts without an id get a fresh one.
 */
export interface Fact {
	id?: IdentifierLike;
	value: StoredValue;
	links?: FactLink[];
}

export interface FactLink {
	/** Label of the edge: a fact to store, or the id of an existing value. */
	key?: Fact | IdentifierLike;
	target: Fact | IdentifierLike;
}
