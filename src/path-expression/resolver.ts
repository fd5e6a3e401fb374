import { MISS, PathCacheOptions, PathLookup, PathToken, found, hasIndex } from './types';
import { PathCache } from './path-cache';
import { tokenizePath } from './tokenizer';
import { elementAt, lookupMember } from './member-access';
import { Logger } from '../util/logger';
import { noLogger } from '../util/no-logger';

export interface PathResolverOptions {
  /** Logger instance to use; misses are reported at debug level */
  logger?: Logger;
  /** Cache to share with other resolvers */
  cache?: PathCache;
  /** Options for a cache owned by this resolver; ignored when `cache` is given */
  cacheOptions?: PathCacheOptions;
}

/**
 * Resolves dotted path expressions with integer indexers against object graphs.
 * Examples: "OriginalSource", "OriginalSource.Items[0].Title".
 *
 * Resolution is fail-soft: a null root, blank path, unknown member,
 * non-indexable value or out-of-range index is a miss, never an error.
 */
export class PathResolver {
  readonly cache: PathCache;
  private logger: Logger;

  constructor(options: PathResolverOptions = {}) {
    this.cache = options.cache ?? new PathCache(options.cacheOptions);
    this.logger = (options.logger ?? noLogger).createNested('PathResolver');
  }

  /**
   * Cached token sequence for `path`
   */
  tokenize(path: string): readonly PathToken[] {
    return this.cache.getOrAdd(path, tokenizePath);
  }

  /**
   * Resolve `path` against `root`, keeping "no such path" (`found: false`)
   * apart from "resolved to nothing" (`found: true`, `value: null`).
   *
   * @throws {MemberAccessError} Only when a property getter throws
   */
  tryResolve(root: unknown, path: string | null | undefined): PathLookup {
    if (root === null || root === undefined || typeof path !== 'string' || !path.trim()) {
      return MISS;
    }

    const tokens = this.tokenize(path);
    let current: unknown = root;

    for (const token of tokens) {
      if (current === null || current === undefined) {
        break;
      }

      if (token.name) {
        const member = this.lookup(current, token, path);
        if (!member.found) {
          this.logger.debug('Member not found', { path, member: token.name });
          return MISS;
        }
        current = member.value;
      }

      if (hasIndex(token) && current !== null && current !== undefined) {
        const element = elementAt(current, token.index);
        if (!element.found) {
          this.logger.debug('Index not resolvable', { path, member: token.name, index: token.index });
          return MISS;
        }
        current = element.value;
      }
    }

    return found(current ?? null);
  }

  /**
   * Resolve `path` against `root`, returning null on any miss
   */
  resolve(root: unknown, path: string | null | undefined): unknown {
    const result = this.tryResolve(root, path);
    return result.found ? result.value : null;
  }

  private lookup(current: unknown, token: PathToken, path: string): PathLookup {
    try {
      return lookupMember(current, token.name, path);
    } catch (error) {
      this.logger.error('Member getter threw', { path, member: token.name });
      throw error;
    }
  }
}

/**
 * Process-wide resolver; its cache is shared by every caller of
 * {@link tryResolve} and {@link resolvePath}
 */
export const defaultPathResolver = new PathResolver();

export function tryResolve(root: unknown, path: string | null | undefined): PathLookup {
  return defaultPathResolver.tryResolve(root, path);
}

export function resolvePath(root: unknown, path: string | null | undefined): unknown {
  return defaultPathResolver.resolve(root, path);
}
