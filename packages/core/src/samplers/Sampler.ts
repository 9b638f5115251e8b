import type { SamplerName, SamplerState, SamplerStatus } from '@tickscope/shared';
import { getLogger, SourceUnavailableError, TickscopeError } from '@tickscope/shared';
import type { HostFs } from '../sources/HostFs.js';

export type SampleResult = { ok: true } | { ok: false; error: TickscopeError };

const OK: SampleResult = { ok: true };

function toTickscopeError(err: unknown, sampler: SamplerName): TickscopeError {
  if (err instanceof TickscopeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TickscopeError(`${sampler} sampler failed: ${message}`, 'SAMPLE_FAILURE');
}

/**
 * Lifecycle shared by every sampler. `open()` runs once; if it throws, the
 * sampler is disabled for good. `sample()` runs per tick and must only commit
 * new state after the whole reading parsed, so a failed tick leaves the last
 * good reading in place.
 */
export abstract class Sampler {
  abstract readonly name: SamplerName;

  protected readonly fs: HostFs;
  protected sampleCount = 0;

  private state: SamplerState = 'uninitialized';
  private lastError: TickscopeError | null = null;

  constructor(fs: HostFs) {
    this.fs = fs;
  }

  initialize(): SampleResult {
    if (this.state === 'ready') return OK;
    if (this.state === 'disabled') {
      return { ok: false, error: this.lastError ?? new SourceUnavailableError(this.name) };
    }

    try {
      this.open();
      this.state = 'ready';
      return OK;
    } catch (err) {
      const error = toTickscopeError(err, this.name);
      this.state = 'disabled';
      this.lastError = error;
      getLogger().warn({ sampler: this.name, code: error.code }, `Sampler disabled: ${error.message}`);
      return { ok: false, error };
    }
  }

  update(): SampleResult {
    const init = this.initialize();
    if (!init.ok) return init;

    try {
      this.sample();
      this.sampleCount++;
      this.lastError = null;
      return OK;
    } catch (err) {
      const error = toTickscopeError(err, this.name);
      this.lastError = error;
      getLogger().debug({ sampler: this.name, code: error.code }, error.message);
      return { ok: false, error };
    }
  }

  getState(): SamplerState {
    return this.state;
  }

  /** True until a reading with a predecessor exists, i.e. until rates can be derived. */
  isFirstReading(): boolean {
    return this.sampleCount < 2;
  }

  hasReading(): boolean {
    return this.sampleCount > 0;
  }

  getLastError(): TickscopeError | null {
    return this.lastError;
  }

  getStatus(): SamplerStatus {
    return {
      name: this.name,
      state: this.state,
      firstReading: this.isFirstReading(),
      lastError: this.lastError ? this.lastError.message : null,
    };
  }

  /** Releases held handles. Safe to call more than once. */
  close(): void {
    // Nothing held by default
  }

  protected abstract open(): void;

  protected abstract sample(): void;
}
