import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EventBusMessage, HostSnapshot } from '@tickscope/shared';
import { EventBus } from '../events/EventBus.js';
import type { SamplerErrorEvent } from '../events/EventBus.js';

// Mock nanoid to return deterministic IDs
vi.mock('nanoid', () => ({
  nanoid: () => 'test-id-123',
}));

function snapshot(tick: number): HostSnapshot {
  return {
    tick,
    timestamp: new Date('2026-01-01'),
    samplers: [],
    cpu: null,
    memory: null,
    storage: null,
    numa: null,
    perf: null,
    process: null,
  };
}

const parseFailure: SamplerErrorEvent = {
  sampler: 'storage',
  code: 'PARSE_FAILURE',
  message: 'Failed to parse /proc/diskstats: row for sda has 5 fields',
  tick: 3,
};

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('emit and on', () => {
    it('should emit an event and call the listener with correct data', () => {
      const handler = vi.fn();
      const data = snapshot(1);

      eventBus.on('tick:complete', handler);
      eventBus.emit('tick:complete', data);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(data);
    });

    it('should support multiple listeners on the same event', () => {
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      eventBus.on('sampler:error', handler1);
      eventBus.on('sampler:error', handler2);
      eventBus.emit('sampler:error', parseFailure);

      expect(handler1).toHaveBeenCalledWith(parseFailure);
      expect(handler2).toHaveBeenCalledWith(parseFailure);
    });

    it('should not call listeners for different events', () => {
      const tickHandler = vi.fn();
      const stopHandler = vi.fn();

      eventBus.on('tick:complete', tickHandler);
      eventBus.on('collector:stop', stopHandler);
      eventBus.emit('tick:complete', snapshot(1));

      expect(tickHandler).toHaveBeenCalledOnce();
      expect(stopHandler).not.toHaveBeenCalled();
    });
  });

  describe('once', () => {
    it('should call the handler only once', () => {
      const handler = vi.fn();

      eventBus.once('tick:complete', handler);
      eventBus.emit('tick:complete', snapshot(1));
      eventBus.emit('tick:complete', snapshot(2));

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(snapshot(1));
    });
  });

  describe('off', () => {
    it('should only remove the specified listener, leaving others intact', () => {
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      eventBus.on('collector:start', handler1);
      eventBus.on('collector:start', handler2);
      eventBus.off('collector:start', handler1);
      eventBus.emit('collector:start', { interval: 2000, samplers: ['cpu'] });

      expect(handler1).not.toHaveBeenCalled();
      expect(handler2).toHaveBeenCalledOnce();
    });
  });

  describe('wildcard events (onAny / offAny)', () => {
    it('should wrap every event in a message', () => {
      const anyHandler = vi.fn<(message: EventBusMessage) => void>();
      eventBus.onAny(anyHandler);

      eventBus.emit('tick:complete', snapshot(4));

      expect(anyHandler).toHaveBeenCalledOnce();
      const [message] = anyHandler.mock.calls[0];
      expect(message.id).toBe('test-id-123');
      expect(message.type).toBe('tick:complete');
      expect(message.source).toBe('collector');
      expect(message.timestamp).toBeInstanceOf(Date);
      expect(message.data).toEqual(snapshot(4));
    });

    it('should attribute sampler events to their sampler', () => {
      const anyHandler = vi.fn<(message: EventBusMessage) => void>();
      eventBus.onAny(anyHandler);

      eventBus.emit('sampler:disabled', { ...parseFailure, code: 'SOURCE_UNAVAILABLE' });

      expect(anyHandler.mock.calls[0][0].source).toBe('storage');
    });

    it('should stop receiving events after offAny', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);
      eventBus.emit('collector:stop', { ticks: 1 });
      eventBus.offAny(anyHandler);
      eventBus.emit('collector:stop', { ticks: 2 });

      expect(anyHandler).toHaveBeenCalledOnce();
    });
  });

  describe('removeAllListeners', () => {
    it('should remove listeners for every event', () => {
      const handler = vi.fn();
      eventBus.on('tick:complete', handler);
      eventBus.onAny(handler);

      eventBus.removeAllListeners();
      eventBus.emit('tick:complete', snapshot(1));

      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.listenerCount('tick:complete')).toBe(0);
    });
  });

  describe('edge cases', () => {
    it('should handle emitting an event with no listeners without throwing', () => {
      expect(() => eventBus.emit('collector:stop', { ticks: 0 })).not.toThrow();
    });

    it('should handle removing a listener that was never added without throwing', () => {
      expect(() => eventBus.off('tick:complete', vi.fn())).not.toThrow();
    });
  });
});
