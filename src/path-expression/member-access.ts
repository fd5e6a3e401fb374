import { IndexedSequence, MISS, PathLookup, PathResolvable, found } from './types';
import { MemberAccessError } from '../errors/base';

type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export function isPathResolvable(value: object): value is PathResolvable {
  return 'resolveMember' in value && typeof value.resolveMember === 'function';
}

export function isIndexedSequence(value: object): value is IndexedSequence {
  return (
    'count' in value &&
    typeof value.count === 'number' &&
    'getAt' in value &&
    typeof value.getAt === 'function'
  );
}

function isTypedArray(value: object): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function isPlainRecord(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function typeName(value: object): string {
  return value.constructor?.name || 'Object';
}

/**
 * Look up a public, readable, instance-level property by exact name.
 *
 * Plain records expose their own enumerable properties. Other objects expose
 * getters only, found on the object or its prototypes below Object.prototype
 * and Function.prototype; fields and methods are not properties, except the
 * `length` of arrays and strings. Primitives are boxed for the lookup.
 *
 * @throws {MemberAccessError} If the getter itself throws
 */
export function lookupMember(target: unknown, name: string, path?: string): PathLookup {
  if (target === null || target === undefined) {
    return MISS;
  }
  if (typeof target !== 'object' && typeof target !== 'function') {
    const boxed: object = Object(target);
    return lookupMember(boxed, name, path);
  }

  if (isPathResolvable(target)) {
    return toLookup(target.resolveMember(name));
  }

  if (isPlainRecord(target)) {
    const descriptor = Object.getOwnPropertyDescriptor(target, name);
    if (!descriptor?.enumerable) {
      return MISS;
    }
    if ('value' in descriptor) {
      return found(descriptor.value);
    }
    return descriptor.get ? invokeGetter(target, name, descriptor.get, path) : MISS;
  }

  if (name === 'length' && hasReadableLength(target)) {
    return found(target.length);
  }

  let owner: object | null = target;
  while (owner !== null && owner !== Object.prototype && owner !== Function.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(owner, name);
    if (descriptor) {
      // The nearest definition wins, as it does for an ordinary property read
      return descriptor.get ? invokeGetter(target, name, descriptor.get, path) : MISS;
    }
    owner = Object.getPrototypeOf(owner);
  }
  return MISS;
}

function hasReadableLength(value: object): value is unknown[] | String {
  return Array.isArray(value) || value instanceof String;
}

/**
 * Results from PathResolvable implementers written without type checking
 * may not be a PathLookup at all
 */
function toLookup(result: unknown): PathLookup {
  if (typeof result !== 'object' || result === null || !('found' in result) || result.found !== true) {
    return MISS;
  }
  return found('value' in result ? result.value : null);
}

function invokeGetter(
  target: object,
  name: string,
  getter: () => unknown,
  path?: string,
): PathLookup {
  try {
    return found(getter.call(target));
  } catch (error) {
    throw new MemberAccessError(
      `Getter for '${name}' on ${typeName(target)} threw: ${error instanceof Error ? error.message : String(error)}`,
      { member: name, targetType: typeName(target), path },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Positional get on an array, typed array or {@link IndexedSequence}.
 * Anything else, including strings, is not indexable.
 */
export function elementAt(target: unknown, index: number): PathLookup {
  if (target === null || typeof target !== 'object' || index < 0) {
    return MISS;
  }

  if (Array.isArray(target)) {
    return index < target.length ? found(target[index]) : MISS;
  }

  if (isTypedArray(target)) {
    return index < target.length ? found(target[index]) : MISS;
  }

  if (isIndexedSequence(target)) {
    return index < target.count ? found(target.getAt(index)) : MISS;
  }

  return MISS;
}
