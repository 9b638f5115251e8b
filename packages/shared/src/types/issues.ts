import type { SamplerName } from './snapshot.js';

export type IssueSeverity = 'warning' | 'critical';

export interface Issue {
  severity: IssueSeverity;
  source: SamplerName;
  message: string;
}
