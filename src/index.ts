/* istanbul ignore file */
export {
  PathResolver,
  PathResolverOptions,
  defaultPathResolver,
  tryResolve,
  resolvePath,
  PathCache,
  tokenizePath,
  lookupMember,
  elementAt,
  isPathResolvable,
  isIndexedSequence,
  PathToken,
  PathLookup,
  PathResolvable,
  IndexedSequence,
  PathCacheOptions,
  PathCacheStats,
  MISS,
  found,
  hasIndex,
} from './path-expression';
export { ValueConverter, PathExpressionConverter } from './converters';
export {
  EventToCommand,
  EventToCommandOptions,
  KeyToCommand,
  KeyToCommandOptions,
  KeyGesture,
  KeyEventArgs,
  ModifierKey,
  isKeyEventArgs,
  matchesGesture,
  parseKeyGesture,
  Command,
  HandleableEventArgs,
  isHandleableEventArgs,
} from './behaviors';

export {
  PathExpressionError,
  ValidationError,
  NotSupportedError,
  MemberAccessError,
  ErrorCode,
  ErrorCategory,
} from './errors';
export { Logger, ConsoleLogger, TestLogger, LogEntry, NoLogger, noLogger } from './util/logger';
export { DEFAULT_PATH_CACHE_OPTIONS, MAX_PATH_CACHE_ENTRIES } from './constants/path-cache';
export { CacheOptionsValidator } from './utils/cache-options-validator';
