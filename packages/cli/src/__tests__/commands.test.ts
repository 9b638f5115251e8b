import { describe, it, expect, vi } from 'vitest';
import { Command } from 'commander';

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get() {
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {}, handler);

  return { default: chainable };
});

import type { HostFs } from '@tickscope/core';
import { SourceUnavailableError, resolveConfig } from '@tickscope/shared';
import { watchCommand } from '../commands/watch.js';
import { topCommand } from '../commands/top.js';
import { snapshotCommand } from '../commands/snapshot.js';
import { doctorCommand, checkSources, probeSamplers } from '../commands/doctor.js';
import { initCommand } from '../commands/init.js';

function getOptionFlags(command: Command): string[] {
  return command.options.map((opt) => opt.flags);
}

/** Files only; every directory listing fails. */
class FileOnlyHostFs implements HostFs {
  readonly root = '/';

  constructor(private readonly files: Record<string, string>) {}

  readText(path: string): string {
    const content = this.files[path];
    if (content === undefined) throw new SourceUnavailableError(path, 'ENOENT');
    return content;
  }

  listDir(path: string): string[] {
    throw new SourceUnavailableError(path, 'ENOENT');
  }

  exists(path: string): boolean {
    return Object.keys(this.files).some((file) => file === path || file.startsWith(`${path}/`));
  }
}

describe('CLI Command Definitions', () => {
  describe('watchCommand', () => {
    it('should be a Commander Command named "watch"', () => {
      expect(watchCommand).toBeInstanceOf(Command);
      expect(watchCommand.name()).toBe('watch');
    });

    it('should accept the collector options and --once', () => {
      const flags = getOptionFlags(watchCommand);
      expect(flags).toContain('-i, --interval <duration>');
      expect(flags).toContain('-c, --config <path>');
      expect(flags).toContain('--perf');
      expect(flags).toContain('--perf-source <kind>');
      expect(flags).toContain('--numa');
      expect(flags).toContain('--process');
      expect(flags).toContain('--host-root <path>');
      expect(flags).toContain('--log-file <path>');
      expect(flags).toContain('--once');
    });
  });

  describe('topCommand', () => {
    it('should default the view to overview', () => {
      expect(topCommand.name()).toBe('top');
      const opt = topCommand.options.find((o) => o.long === '--view');
      expect(opt?.defaultValue).toBe('overview');
    });
  });

  describe('snapshotCommand', () => {
    it('should have a --json option', () => {
      expect(snapshotCommand.name()).toBe('snapshot');
      expect(getOptionFlags(snapshotCommand)).toContain('--json');
    });
  });

  describe('doctorCommand', () => {
    it('should accept a host root', () => {
      expect(doctorCommand.name()).toBe('doctor');
      expect(getOptionFlags(doctorCommand)).toContain('--host-root <path>');
    });
  });

  describe('initCommand', () => {
    it('should default to the basic template', () => {
      const opt = initCommand.options.find((o) => o.long === '--template');
      expect(opt?.defaultValue).toBe('basic');
    });
  });
});

describe('doctor checks', () => {
  const fs = new FileOnlyHostFs({
    '/proc/stat': 'cpu  10 0 5 100 0 0 0 0 0 0\ncpu0 10 0 5 100 0 0 0 0 0 0\n',
    '/proc/meminfo': 'MemTotal:       1000 kB\nMemFree:         500 kB\n',
  });

  it('should report which sources are present', () => {
    const present = checkSources(fs)
      .filter((check) => check.present)
      .map((check) => check.path);

    expect(present).toEqual(['/proc/stat', '/proc/meminfo', '/proc']);
  });

  it('should flag the NUMA topology and interrupt table as optional', () => {
    const optional = checkSources(fs)
      .filter((check) => !check.required)
      .map((check) => check.path);

    expect(optional).toEqual(['/proc/interrupts', '/sys/devices/system/node']);
  });

  it('should probe every sampler regardless of config', () => {
    const statuses = probeSamplers(resolveConfig({}), fs);

    expect(statuses.map((status) => [status.name, status.state])).toEqual([
      ['cpu', 'ready'],
      ['memory', 'ready'],
      ['storage', 'disabled'],
      ['numa', 'disabled'],
      ['perf', 'disabled'],
      ['process', 'disabled'],
    ]);
  });

  it('should carry the reason a sampler is disabled', () => {
    const storage = probeSamplers(resolveConfig({}), fs).find((status) => status.name === 'storage');

    expect(storage?.lastError).toBe('Source unavailable: /proc/diskstats (ENOENT)');
  });
});
