/**
 * One parsed segment of a path expression: a member name plus an optional
 * integer indexer, e.g. `Items[0]` -> { name: 'Items', index: 0 }
 */
export interface PathToken {
  readonly name: string;
  readonly index?: number;
}

/**
 * Outcome of resolving a path or a single hop. `found: false` is a structural
 * miss; `found: true` with a null value means the path resolved to nothing.
 */
export type PathLookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false; readonly value: null };

/**
 * Lets a type publish its readable members to the resolver explicitly
 */
export interface PathResolvable {
  resolveMember(name: string): PathLookup;
}

/**
 * List-like container with a count and positional access
 */
export interface IndexedSequence {
  readonly count: number;
  getAt(index: number): unknown;
}

export interface PathCacheOptions {
  /** Maximum number of cached paths; 0 means unbounded */
  maxEntries?: number;
}

export interface PathCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

export const MISS: PathLookup = Object.freeze({ found: false, value: null });

export function found(value: unknown): PathLookup {
  return { found: true, value };
}

export function hasIndex(token: PathToken): token is PathToken & { readonly index: number } {
  return token.index !== undefined;
}
