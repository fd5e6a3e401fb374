import { PathCacheOptions } from '../path-expression/types';

/**
 * Cache size used when no options are given.
 * 0 keeps every parsed path: path strings come from markup and configuration,
 * so the set of distinct keys is small and fixed.
 */
export const DEFAULT_PATH_CACHE_OPTIONS: Required<PathCacheOptions> = {
  maxEntries: 0,
};

/**
 * Upper bound accepted for `maxEntries`
 */
export const MAX_PATH_CACHE_ENTRIES = 100000;
