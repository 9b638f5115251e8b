import type { PerfEvent, PerfSourceKind } from '@tickscope/shared';
import { SourceUnavailableError } from '@tickscope/shared';

export interface PerfCounterHandle {
  /** Current cumulative count. */
  read(): number;
  close(): void;
}

/**
 * Opens one hardware or software event counter for the whole system.
 * `open` throws `SourceUnavailableError` when the event cannot be counted.
 */
export interface PerfCounterSource {
  readonly description: string;
  open(event: PerfEvent): PerfCounterHandle;
}

/** Node.js has no perf_event_open binding, so by default no event can be opened. */
export class UnavailablePerfSource implements PerfCounterSource {
  readonly description = 'unavailable';

  open(event: PerfEvent): PerfCounterHandle {
    throw new SourceUnavailableError(`perf:${event}`, 'no hardware counter binding in this runtime');
  }
}

/** Counts added per read: IPC 2, a 90% cache hit rate and a 2% branch miss rate. */
const SIMULATED_STEPS: Record<PerfEvent, number> = {
  cycles: 1000,
  instructions: 2000,
  cacheReferences: 1000,
  cacheMisses: 100,
  branchInstructions: 250,
  branchMisses: 5,
  contextSwitches: 10,
  pageFaults: 1,
};

/**
 * Deterministic stand-in for hosts without counter access. Every handle
 * advances by a fixed step on each read, so the derived metrics stay
 * constant from the second reading on.
 */
export class SimulatedPerfSource implements PerfCounterSource {
  readonly description = 'simulated';

  open(event: PerfEvent): PerfCounterHandle {
    const step = SIMULATED_STEPS[event];
    let count = 0;
    let closed = false;
    return {
      read: () => {
        if (closed) throw new SourceUnavailableError(`perf:${event}`, 'counter closed');
        count += step;
        return count;
      },
      close: () => {
        closed = true;
      },
    };
  }
}

export function createPerfSource(kind: PerfSourceKind): PerfCounterSource {
  switch (kind) {
    case 'simulated':
      return new SimulatedPerfSource();
    case 'unavailable':
      return new UnavailablePerfSource();
  }
}
