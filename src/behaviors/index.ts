export { EventToCommand, EventToCommandOptions } from './event-to-command';
export { KeyToCommand, KeyToCommandOptions } from './key-to-command';
export {
  KeyGesture,
  KeyEventArgs,
  ModifierKey,
  isKeyEventArgs,
  matchesGesture,
  parseKeyGesture,
} from './key-gesture';
export { Command, HandleableEventArgs, isHandleableEventArgs } from './types';
