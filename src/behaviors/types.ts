/**
 * Command invoked by an event-to-command behavior
 */
export interface Command {
  canExecute(parameter: unknown): boolean;
  execute(parameter: unknown): void;
}

/**
 * Event arguments that carry a handled flag, like routed UI events
 */
export interface HandleableEventArgs {
  handled: boolean;
}

export function isHandleableEventArgs(value: unknown): value is HandleableEventArgs {
  return (
    typeof value === 'object' &&
    value !== null &&
    'handled' in value &&
    typeof value.handled === 'boolean'
  );
}
