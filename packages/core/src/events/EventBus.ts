import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { EventBusMessage, EventSource, HostSnapshot, SamplerName } from '@tickscope/shared';

export interface SamplerErrorEvent {
  sampler: SamplerName;
  code: string;
  message: string;
  tick: number;
}

export interface CollectorStartEvent {
  interval: number;
  samplers: SamplerName[];
}

export interface CollectorStopEvent {
  ticks: number;
}

type EventMap = {
  'tick:complete': HostSnapshot;
  'sampler:error': SamplerErrorEvent;
  'sampler:disabled': SamplerErrorEvent;
  'collector:start': CollectorStartEvent;
  'collector:stop': CollectorStopEvent;
};

export type EventName = keyof EventMap;

function sourceOf(data: unknown): EventSource {
  if (typeof data === 'object' && data !== null && 'sampler' in data) {
    const sampler = data.sampler;
    if (
      sampler === 'cpu' ||
      sampler === 'memory' ||
      sampler === 'storage' ||
      sampler === 'numa' ||
      sampler === 'perf' ||
      sampler === 'process'
    ) {
      return sampler;
    }
  }
  return 'collector';
}

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: sourceOf(data),
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  listenerCount(event: EventName | '*'): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
