import { PathCacheOptions } from '../path-expression/types';
import { DEFAULT_PATH_CACHE_OPTIONS, MAX_PATH_CACHE_ENTRIES } from '../constants/path-cache';
import { ValidationError } from '../errors/base';

/**
 * Utility class for validating path cache options
 */
export class CacheOptionsValidator {
  /**
   * Validates cache options and fills in defaults
   *
   * @throws ValidationError if `maxEntries` is not an integer in [0, MAX_PATH_CACHE_ENTRIES]
   */
  static validate(options: PathCacheOptions = {}): Required<PathCacheOptions> {
    return {
      maxEntries: this.validateMaxEntries(options.maxEntries),
    };
  }

  static validateMaxEntries(maxEntries: unknown): number {
    if (maxEntries === undefined || maxEntries === null) {
      return DEFAULT_PATH_CACHE_OPTIONS.maxEntries;
    }

    if (typeof maxEntries !== 'number') {
      throw new ValidationError('maxEntries must be a number', {
        value: maxEntries,
        type: typeof maxEntries,
      });
    }

    if (!Number.isInteger(maxEntries)) {
      throw new ValidationError('maxEntries must be an integer', { value: maxEntries });
    }

    if (maxEntries < 0) {
      throw new ValidationError('maxEntries cannot be negative', { value: maxEntries });
    }

    if (maxEntries > MAX_PATH_CACHE_ENTRIES) {
      throw new ValidationError(`maxEntries cannot exceed ${MAX_PATH_CACHE_ENTRIES}`, {
        value: maxEntries,
        maxValue: MAX_PATH_CACHE_ENTRIES,
      });
    }

    return maxEntries;
  }
}
