export { ValueConverter } from './types';
export { PathExpressionConverter } from './path-expression-converter';
