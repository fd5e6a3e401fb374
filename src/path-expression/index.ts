export { PathResolver, PathResolverOptions, defaultPathResolver, tryResolve, resolvePath } from './resolver';
export { PathCache } from './path-cache';
export { tokenizePath } from './tokenizer';
export { lookupMember, elementAt, isPathResolvable, isIndexedSequence } from './member-access';
export {
  PathToken,
  PathLookup,
  PathResolvable,
  IndexedSequence,
  PathCacheOptions,
  PathCacheStats,
  MISS,
  found,
  hasIndex,
} from './types';
