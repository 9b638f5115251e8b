import type { SamplerName } from './snapshot.js';

export type EventSource = SamplerName | 'collector';

export interface EventBusMessage {
  id: string;
  type: string;
  source: EventSource;
  timestamp: Date;
  data: unknown;
}
