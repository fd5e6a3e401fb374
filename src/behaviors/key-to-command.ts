import { EventToCommand, EventToCommandOptions } from './event-to-command';
import { KeyGesture, isKeyEventArgs, matchesGesture, parseKeyGesture } from './key-gesture';

export interface KeyToCommandOptions extends EventToCommandOptions {
  /** Gesture that triggers the command; text such as "Ctrl+S" is parsed */
  gesture?: KeyGesture | string | null;
}

/**
 * Executes a command in response to a key gesture.
 * Without a gesture the command never runs.
 */
export class KeyToCommand extends EventToCommand {
  gesture: KeyGesture | null;

  constructor(options: KeyToCommandOptions = {}) {
    super(options);
    const gesture = options.gesture ?? null;
    this.gesture = typeof gesture === 'string' ? parseKeyGesture(gesture) : gesture;
  }

  canExecuteCommand(sender: unknown, eventArgs: unknown): boolean {
    if (!this.gesture || !isKeyEventArgs(eventArgs)) {
      return false;
    }
    if (!matchesGesture(this.gesture, eventArgs)) {
      this.logger.debug('Gesture not matched', { key: eventArgs.key });
      return false;
    }
    return super.canExecuteCommand(sender, eventArgs);
  }
}
