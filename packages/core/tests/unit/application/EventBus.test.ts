import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { CallRejectedEvent, TableValidatedEvent } from '../../../src/domain/events/DomainEvents.js';

function tableValidated(errorCount = 0): TableValidatedEvent {
  return {
    type: 'table:validated',
    schema: 'Orders',
    location: 'value',
    rowCount: 3,
    errorCount,
    timestamp: Date.now(),
  };
}

const rejected: CallRejectedEvent = {
  type: 'call:rejected',
  functionName: 'summarize',
  phase: 'input',
  errorCount: 2,
  timestamp: Date.now(),
};

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('table:validated', handler);

    const event = tableValidated();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('table:validated', handler);
    bus.emit(rejected);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('call:rejected', handler1);
    bus.on('call:rejected', handler2);
    bus.emit(rejected);

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('table:validated', handler);
    bus.off('table:validated', handler);
    bus.emit(tableValidated());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should not propagate errors from throwing handlers', () => {
    const bus = new EventBus();

    bus.on('table:validated', () => {
      throw new Error('handler exploded');
    });

    expect(() => bus.emit(tableValidated())).not.toThrow();
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const handler1 = vi.fn(() => {
      throw new Error('first handler fails');
    });
    const handler2 = vi.fn();

    bus.on('table:validated', handler1);
    bus.on('table:validated', handler2);
    bus.emit(tableValidated());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should hand handler errors to onHandlerError with the event', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus({ onHandlerError });
    const failure = new Error('subscriber down');

    bus.on('call:rejected', () => {
      throw failure;
    });
    bus.emit(rejected);

    expect(onHandlerError).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledWith(failure, rejected);
  });

  it('should do nothing when emitting event with no handlers', () => {
    const bus = new EventBus();

    expect(() => bus.emit(tableValidated())).not.toThrow();
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);

    const validated = tableValidated(1);
    bus.emit(validated);
    bus.emit(rejected);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenCalledWith(validated);
    expect(handler).toHaveBeenCalledWith(rejected);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(rejected);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should not propagate errors from throwing onAny handlers', () => {
    const bus = new EventBus();
    const good = vi.fn();

    bus.onAny(() => {
      throw new Error('wildcard exploded');
    });
    bus.onAny(good);

    expect(() => bus.emit(rejected)).not.toThrow();
    expect(good).toHaveBeenCalledOnce();
  });
});
