/**
 * Two-way value transform invoked at a binding or event boundary.
 * `parameter` is the transform's external argument, such as a path string.
 */
export interface ValueConverter {
  convert(value: unknown, parameter?: unknown): unknown;
  convertBack(value: unknown, parameter?: unknown): unknown;
}
