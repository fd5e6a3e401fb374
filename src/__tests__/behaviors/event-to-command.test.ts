import { EventToCommand } from '../../behaviors/event-to-command';
import { isHandleableEventArgs } from '../../behaviors/types';
import { TestLogger } from '../../util/logger';
import { ItemModel } from '../test-utils';

function createCommand(canExecute = true) {
  return {
    canExecute: jest.fn().mockReturnValue(canExecute),
    execute: jest.fn(),
  };
}

describe('EventToCommand', () => {
  const sender = new ItemModel(7, 'Sender Title');
  const eventArgs = { originalSource: { items: ['first', 'second'] } };

  describe('resolveCommandParameter', () => {
    it('prefers a fixed command parameter', () => {
      const behavior = new EventToCommand({
        commandParameter: 'fixed',
        eventArgsParameterPath: 'originalSource.items[0]',
        passEventArgsToCommand: true,
      });
      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBe('fixed');
    });

    it('uses the event args converter with the sender as parameter', () => {
      const eventArgsConverter = {
        convert: jest.fn().mockReturnValue('converted'),
        convertBack: jest.fn(),
      };
      const behavior = new EventToCommand({
        eventArgsConverter,
        eventArgsParameterPath: 'originalSource.items[0]',
      });

      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBe('converted');
      expect(eventArgsConverter.convert).toHaveBeenCalledWith(eventArgs, sender);
    });

    it('resolves the event args parameter path', () => {
      const behavior = new EventToCommand({ eventArgsParameterPath: 'originalSource.items[1]' });
      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBe('second');
    });

    it('does not fall back to the sender path when the event args path misses', () => {
      const behavior = new EventToCommand({
        eventArgsParameterPath: 'missing',
        senderParameterPath: 'title',
      });
      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBeNull();
    });

    it('resolves the sender parameter path', () => {
      const behavior = new EventToCommand({ senderParameterPath: 'title' });
      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBe('Sender Title');
    });

    it('passes the event args when asked to', () => {
      const behavior = new EventToCommand({ passEventArgsToCommand: true });
      expect(behavior.resolveCommandParameter(sender, eventArgs)).toBe(eventArgs);
    });

    it('defaults to null', () => {
      expect(new EventToCommand().resolveCommandParameter(sender, eventArgs)).toBeNull();
    });
  });

  describe('handleEvent', () => {
    it('executes the command with the resolved parameter', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command, senderParameterPath: 'id' });

      expect(behavior.handleEvent(sender, eventArgs)).toBe(true);
      expect(command.canExecute).toHaveBeenCalledWith(7);
      expect(command.execute).toHaveBeenCalledWith(7);
    });

    it('skips when canExecute is false', () => {
      const command = createCommand(false);
      const behavior = new EventToCommand({ command });

      expect(behavior.handleEvent(sender, eventArgs)).toBe(false);
      expect(command.execute).not.toHaveBeenCalled();
    });

    it('skips when disabled', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command, isEnabled: false });

      expect(behavior.handleEvent(sender, eventArgs)).toBe(false);
      expect(command.canExecute).not.toHaveBeenCalled();
      expect(command.execute).not.toHaveBeenCalled();
    });

    it('skips without a command', () => {
      const logger = new TestLogger();
      const behavior = new EventToCommand({ logger });

      expect(behavior.handleEvent(sender, eventArgs)).toBe(false);
      expect(logger.getLogs()).toEqual([
        { level: 'debug', message: 'Command not executable', data: { hasCommand: false } },
      ]);
    });

    it('skips events already marked handled', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command });

      expect(behavior.handleEvent(sender, { handled: true })).toBe(false);
      expect(command.execute).not.toHaveBeenCalled();
    });

    it('processes handled events when configured', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command, processHandledEvent: true });

      expect(behavior.handleEvent(sender, { handled: true })).toBe(true);
      expect(command.execute).toHaveBeenCalledWith(null);
    });

    it('marks the event handled after executing', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command, markEventHandled: true });
      const args = { handled: false, key: 'Enter' };

      behavior.handleEvent(sender, args);

      expect(args.handled).toBe(true);
    });

    it('leaves the event unmarked by default', () => {
      const command = createCommand();
      const behavior = new EventToCommand({ command });
      const args = { handled: false };

      behavior.handleEvent(sender, args);

      expect(args.handled).toBe(false);
    });
  });
});

describe('isHandleableEventArgs', () => {
  it('requires a boolean handled flag', () => {
    expect(isHandleableEventArgs({ handled: false })).toBe(true);
    expect(isHandleableEventArgs({ handled: 'yes' })).toBe(false);
    expect(isHandleableEventArgs(null)).toBe(false);
    expect(isHandleableEventArgs('handled')).toBe(false);
  });
});
