import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { JobStartedEvent, JobWarningEvent } from '../../../src/domain/events/DomainEvents.js';

const started: JobStartedEvent = {
  type: 'job:started',
  jobId: 'test-job',
  workers: 4,
  totalRows: 100,
  timestamp: 0,
};

const warning: JobWarningEvent = {
  type: 'job:warning',
  jobId: 'test-job',
  message: 'Free trial account detected',
  timestamp: 0,
};

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);
    bus.emit(started);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(started);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);
    bus.emit(warning);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('job:started', handler1);
    bus.on('job:started', handler2);
    bus.emit(started);

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);
    bus.off('job:started', handler);
    bus.emit(started);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event to wildcard handlers until removed', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(started);
    bus.emit(warning);
    bus.offAny(handler);
    bus.emit(started);

    expect(handler.mock.calls).toEqual([[started], [warning]]);
  });

  it('should keep calling handlers when one throws', () => {
    const bus = new EventBus();
    const failing = vi.fn(() => {
      throw new Error('handler failure');
    });
    const typed = vi.fn();
    const wildcard = vi.fn();

    bus.on('job:warning', failing);
    bus.on('job:warning', typed);
    bus.onAny(failing);
    bus.onAny(wildcard);

    expect(() => {
      bus.emit(warning);
    }).not.toThrow();
    expect(typed).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
  });
});
