import { ValueConverter } from './types';
import { PathResolver, defaultPathResolver } from '../path-expression/resolver';
import { NotSupportedError } from '../errors/base';

/**
 * Value converter that reads a value out of its input by a path expression
 * passed as the converter parameter, e.g. `convert(eventArgs, 'OriginalSource.Items[0]')`.
 * Every miss, and a null value resolved by the path, comes back as null.
 */
export class PathExpressionConverter implements ValueConverter {
  static readonly instance = new PathExpressionConverter();

  constructor(private readonly resolver: PathResolver = defaultPathResolver) {}

  convert(value: unknown, parameter?: unknown): unknown {
    if (value === null || value === undefined || typeof parameter !== 'string') {
      return null;
    }
    return this.resolver.resolve(value, parameter);
  }

  /**
   * @throws {NotSupportedError} Always; a resolved value cannot be written back through a path
   */
  convertBack(_value: unknown, _parameter?: unknown): never {
    throw new NotSupportedError(`convertBack is not supported by ${this.constructor.name}.`, {
      converter: this.constructor.name,
    });
  }
}
