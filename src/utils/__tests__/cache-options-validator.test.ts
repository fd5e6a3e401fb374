import { CacheOptionsValidator } from '../cache-options-validator';
import { MAX_PATH_CACHE_ENTRIES } from '../../constants/path-cache';
import { ValidationError } from '../../errors/base';

describe('CacheOptionsValidator', () => {
  describe('validate', () => {
    it('fills in defaults', () => {
      expect(CacheOptionsValidator.validate()).toEqual({ maxEntries: 0 });
      expect(CacheOptionsValidator.validate({})).toEqual({ maxEntries: 0 });
    });

    it('keeps a valid bound', () => {
      expect(CacheOptionsValidator.validate({ maxEntries: 256 })).toEqual({ maxEntries: 256 });
      expect(CacheOptionsValidator.validate({ maxEntries: MAX_PATH_CACHE_ENTRIES })).toEqual({
        maxEntries: MAX_PATH_CACHE_ENTRIES,
      });
    });
  });

  describe('validateMaxEntries', () => {
    it('returns the default for null', () => {
      expect(CacheOptionsValidator.validateMaxEntries(null)).toBe(0);
    });

    it('rejects non-numbers', () => {
      expect(() => CacheOptionsValidator.validateMaxEntries('5')).toThrow(
        'maxEntries must be a number',
      );
    });

    it('rejects fractions', () => {
      expect(() => CacheOptionsValidator.validateMaxEntries(2.5)).toThrow(
        'maxEntries must be an integer',
      );
    });

    it('rejects negative values', () => {
      expect(() => CacheOptionsValidator.validateMaxEntries(-3)).toThrow(
        'maxEntries cannot be negative',
      );
    });

    it('rejects values above the maximum', () => {
      let error: unknown;
      try {
        CacheOptionsValidator.validateMaxEntries(MAX_PATH_CACHE_ENTRIES + 1);
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe(`maxEntries cannot exceed ${MAX_PATH_CACHE_ENTRIES}`);
        expect(error.context).toEqual({
          value: MAX_PATH_CACHE_ENTRIES + 1,
          maxValue: MAX_PATH_CACHE_ENTRIES,
        });
      }
    });
  });
});
