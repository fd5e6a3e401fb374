import { Command, isHandleableEventArgs } from './types';
import { ValueConverter } from '../converters/types';
import { PathExpressionConverter } from '../converters/path-expression-converter';
import { Logger } from '../util/logger';
import { noLogger } from '../util/no-logger';

export interface EventToCommandOptions {
  /** Command to execute when the event is raised */
  command?: Command | null;
  /** Fixed parameter; takes precedence over every other source */
  commandParameter?: unknown;
  /** Converter applied to the event args, with the sender as its parameter */
  eventArgsConverter?: ValueConverter | null;
  /** Path resolved against the event args, e.g. "OriginalSource.SelectedItem" */
  eventArgsParameterPath?: string | null;
  /** Path resolved against the sender */
  senderParameterPath?: string | null;
  /** Pass the event args through when no other parameter source applies */
  passEventArgsToCommand?: boolean;
  /** Run the command for events already marked handled */
  processHandledEvent?: boolean;
  /** Mark the event handled after the command runs */
  markEventHandled?: boolean;
  isEnabled?: boolean;
  /** Converter used for the parameter paths */
  converter?: ValueConverter;
  logger?: Logger;
}

/**
 * Turns raised events into command executions.
 *
 * The command parameter comes from the first source that applies:
 * 1. `commandParameter`, when set
 * 2. `eventArgsConverter`
 * 3. `eventArgsParameterPath` resolved against the event args
 * 4. `senderParameterPath` resolved against the sender
 * 5. the event args themselves, when `passEventArgsToCommand` is true
 * 6. otherwise null
 */
export class EventToCommand {
  command: Command | null;
  commandParameter: unknown;
  eventArgsConverter: ValueConverter | null;
  eventArgsParameterPath: string | null;
  senderParameterPath: string | null;
  passEventArgsToCommand: boolean;
  processHandledEvent: boolean;
  markEventHandled: boolean;
  isEnabled: boolean;

  private converter: ValueConverter;
  protected logger: Logger;

  constructor(options: EventToCommandOptions = {}) {
    this.command = options.command ?? null;
    this.commandParameter = options.commandParameter ?? null;
    this.eventArgsConverter = options.eventArgsConverter ?? null;
    this.eventArgsParameterPath = options.eventArgsParameterPath ?? null;
    this.senderParameterPath = options.senderParameterPath ?? null;
    this.passEventArgsToCommand = options.passEventArgsToCommand ?? false;
    this.processHandledEvent = options.processHandledEvent ?? false;
    this.markEventHandled = options.markEventHandled ?? false;
    this.isEnabled = options.isEnabled ?? true;
    this.converter = options.converter ?? PathExpressionConverter.instance;
    this.logger = (options.logger ?? noLogger).createNested('EventToCommand');
  }

  resolveCommandParameter(sender: unknown, eventArgs: unknown): unknown {
    if (this.commandParameter !== null && this.commandParameter !== undefined) {
      return this.commandParameter;
    }

    if (this.eventArgsConverter) {
      return this.eventArgsConverter.convert(eventArgs, sender);
    }

    if (this.eventArgsParameterPath) {
      return this.converter.convert(eventArgs, this.eventArgsParameterPath);
    }

    if (this.senderParameterPath) {
      return this.converter.convert(sender, this.senderParameterPath);
    }

    return this.passEventArgsToCommand ? eventArgs : null;
  }

  canExecuteCommand(sender: unknown, eventArgs: unknown): boolean {
    if (!this.isEnabled || !this.command) {
      return false;
    }
    return this.command.canExecute(this.resolveCommandParameter(sender, eventArgs));
  }

  /**
   * Handle a raised event. Returns whether the command was executed.
   */
  handleEvent(sender: unknown, eventArgs: unknown): boolean {
    if (isHandleableEventArgs(eventArgs) && eventArgs.handled && !this.processHandledEvent) {
      this.logger.debug('Skipping handled event');
      return false;
    }

    const command = this.command;
    if (!command || !this.canExecuteCommand(sender, eventArgs)) {
      this.logger.debug('Command not executable', { hasCommand: command !== null });
      return false;
    }

    const parameter = this.resolveCommandParameter(sender, eventArgs);
    this.logger.debug('Executing command', { parameter });
    command.execute(parameter);

    if (this.markEventHandled && isHandleableEventArgs(eventArgs)) {
      eventArgs.handled = true;
    }
    return true;
  }
}
