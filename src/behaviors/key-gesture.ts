import { ValidationError } from '../errors/base';

export type ModifierKey = 'Alt' | 'Control' | 'Shift' | 'Meta';

/**
 * A key plus the exact set of modifiers that must be held with it
 */
export interface KeyGesture {
  key: string;
  modifiers?: readonly ModifierKey[];
}

/**
 * Key event arguments. Modifiers come either as a list or, like a DOM
 * KeyboardEvent, as boolean flags.
 */
export interface KeyEventArgs {
  key: string;
  modifiers?: readonly ModifierKey[];
  altKey?: boolean;
  ctrlKey?: boolean;
  shiftKey?: boolean;
  metaKey?: boolean;
}

const MODIFIER_ALIASES: Record<string, ModifierKey> = {
  alt: 'Alt',
  ctrl: 'Control',
  control: 'Control',
  shift: 'Shift',
  meta: 'Meta',
  cmd: 'Meta',
  win: 'Meta',
};

export function isKeyEventArgs(value: unknown): value is KeyEventArgs {
  return typeof value === 'object' && value !== null && 'key' in value && typeof value.key === 'string';
}

function heldModifiers(args: KeyEventArgs): Set<ModifierKey> {
  if (args.modifiers) {
    return new Set(args.modifiers);
  }
  const held = new Set<ModifierKey>();
  if (args.altKey) held.add('Alt');
  if (args.ctrlKey) held.add('Control');
  if (args.shiftKey) held.add('Shift');
  if (args.metaKey) held.add('Meta');
  return held;
}

export function matchesGesture(gesture: KeyGesture, args: KeyEventArgs): boolean {
  if (gesture.key.toLowerCase() !== args.key.toLowerCase()) {
    return false;
  }
  const expected = new Set(gesture.modifiers ?? []);
  const held = heldModifiers(args);
  if (expected.size !== held.size) {
    return false;
  }
  for (const modifier of held) {
    if (!expected.has(modifier)) {
      return false;
    }
  }
  return true;
}

/**
 * Parse a gesture written as text, e.g. "Ctrl+Shift+S"
 *
 * @throws {ValidationError} If the key is missing or a modifier is unknown
 */
export function parseKeyGesture(text: string): KeyGesture {
  const parts = text.split('+').map((part) => part.trim());
  const key = parts.pop() ?? '';
  if (!key) {
    throw new ValidationError('Key gesture must end with a key', { gesture: text });
  }

  const modifiers: ModifierKey[] = [];
  for (const part of parts) {
    const alias = part.toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(MODIFIER_ALIASES, alias)) {
      throw new ValidationError(`Unknown modifier '${part}' in key gesture`, { gesture: text });
    }
    const modifier = MODIFIER_ALIASES[alias];
    if (!modifiers.includes(modifier)) {
      modifiers.push(modifier);
    }
  }

  return { key, modifiers };
}
