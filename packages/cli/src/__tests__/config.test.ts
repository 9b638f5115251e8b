import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, resolveConfig } from '@tickscope/shared';
import { findConfigFile, loadConfig, readConfigFile } from '../utils/config.js';
import { configTemplate } from '../commands/init.js';

describe('CLI configuration', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tickscope-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults without a config file', () => {
    const config = loadConfig({}, dir);

    expect(config.interval).toBe(2000);
    expect(config.hostRoot).toBe('/');
    expect(config.samplers).toEqual({
      cpu: true,
      memory: true,
      storage: true,
      numa: false,
      perf: false,
      process: false,
    });
  });

  it('should prefer tickscope.config.json over .tickscope.json', () => {
    writeFileSync(join(dir, '.tickscope.json'), '{}');
    expect(findConfigFile(dir)).toBe(join(dir, '.tickscope.json'));

    writeFileSync(join(dir, 'tickscope.config.json'), '{}');
    expect(findConfigFile(dir)).toBe(join(dir, 'tickscope.config.json'));
  });

  it('should overlay flags on the config file', () => {
    writeFileSync(
      join(dir, 'tickscope.config.json'),
      JSON.stringify({ interval: '500ms', samplers: { numa: true }, log: { level: 'warn' } }),
    );

    const config = loadConfig({ perf: true, interval: '1s', logFile: '/tmp/tickscope.log' }, dir);

    expect(config.interval).toBe(1000);
    expect(config.samplers.numa).toBe(true);
    expect(config.samplers.perf).toBe(true);
    expect(config.samplers.cpu).toBe(true);
    expect(config.log).toEqual({ level: 'warn', pretty: false, file: '/tmp/tickscope.log' });
  });

  it('should enable perf with the source --perf-source names', () => {
    writeFileSync(join(dir, 'tickscope.config.json'), JSON.stringify({ perf: { branchMissRate: 3 } }));

    const config = loadConfig({ perfSource: 'simulated' }, dir);

    expect(config.samplers.perf).toBe(true);
    expect(config.perf).toEqual({ source: 'simulated', cacheThrashingHitRate: 80, branchMissRate: 3 });
  });

  it('should reject an unknown perf source', () => {
    expect(() => loadConfig({ perfSource: 'pmu' }, dir)).toThrow(ConfigValidationError);
  });

  it('should read an explicit --config path relative to the working directory', () => {
    writeFileSync(join(dir, 'host.json'), JSON.stringify({ hostRoot: '/host' }));

    expect(loadConfig({ config: 'host.json' }, dir).hostRoot).toBe('/host');
  });

  it('should let --host-root win over the file', () => {
    writeFileSync(join(dir, 'tickscope.config.json'), JSON.stringify({ hostRoot: '/host' }));

    expect(loadConfig({ hostRoot: '/mnt/host' }, dir).hostRoot).toBe('/mnt/host');
  });

  it('should reject malformed JSON', () => {
    const path = join(dir, 'tickscope.config.json');
    writeFileSync(path, '{ interval: ');

    expect(() => readConfigFile(path)).toThrow(ConfigValidationError);
  });

  it('should reject a file that is not an object', () => {
    const path = join(dir, 'tickscope.config.json');
    writeFileSync(path, '[1, 2]');

    try {
      readConfigFile(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.errors).toEqual([`${path}: expected a JSON object`]);
      }
    }
  });

  it('should report a missing explicit config file', () => {
    expect(() => loadConfig({ config: 'missing.json' }, dir)).toThrow(ConfigValidationError);
  });

  it('should surface schema errors from the file', () => {
    writeFileSync(join(dir, 'tickscope.config.json'), JSON.stringify({ samplers: 'all' }));

    expect(() => loadConfig({}, dir)).toThrow(ConfigValidationError);
  });

  it('should generate templates that validate', () => {
    expect(resolveConfig(configTemplate(false)).interval).toBe(2000);

    const full = resolveConfig(configTemplate(true));
    expect(full.storage.hotFraction).toBe(0.25);
    expect(full.storage.sectorSize).toBe(512);
    expect(full.process.topCount).toBe(10);
    expect(full.perf.source).toBe('unavailable');
  });
});
