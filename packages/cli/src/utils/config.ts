import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { LogLevel, ResolvedConfig } from '@tickscope/shared';
import {
  ConfigValidationError,
  TICKSCOPE_CONFIG_FILES,
  createLogger,
  resolveConfig,
  setDefaultLogger,
} from '@tickscope/shared';

/** Flags shared by every command that runs a collector. */
export interface CollectorFlags {
  config?: string;
  interval?: string;
  hostRoot?: string;
  perf?: boolean;
  perfSource?: string;
  numa?: boolean;
  process?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function overlay(base: unknown, patch: Record<string, unknown>): unknown {
  if (Object.keys(patch).length === 0) return base;
  return { ...(isRecord(base) ? base : {}), ...patch };
}

export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of TICKSCOPE_CONFIG_FILES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) return fullPath;
  }
  return null;
}

export function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

/**
 * Merge the config file (explicit `--config`, else the first default name in
 * `cwd`) with command-line flags, then validate. Flags win.
 */
export function loadConfig(flags: CollectorFlags, cwd: string = process.cwd()): ResolvedConfig {
  const path = flags.config ? resolve(cwd, flags.config) : findConfigFile(cwd);
  const file = path ? readConfigFile(path) : {};

  const samplers: Record<string, unknown> = {};
  if (flags.perf || flags.perfSource) samplers.perf = true;
  if (flags.numa) samplers.numa = true;
  if (flags.process) samplers.process = true;

  const perf: Record<string, unknown> = {};
  if (flags.perfSource) perf.source = flags.perfSource;

  const log: Record<string, unknown> = {};
  if (flags.logLevel) log.level = flags.logLevel;
  if (flags.logFile) log.file = flags.logFile;

  const input: Record<string, unknown> = {
    ...file,
    samplers: overlay(file.samplers, samplers),
    perf: overlay(file.perf, perf),
    log: overlay(file.log, log),
  };
  if (flags.interval) input.interval = flags.interval;
  if (flags.hostRoot) input.hostRoot = flags.hostRoot;

  return resolveConfig(input);
}

/** Route logs to the configured file, else stderr, so stdout stays free for views. */
export function setupLogging(config: ResolvedConfig): void {
  const { level, pretty, file } = config.log;
  setDefaultLogger(
    createLogger({
      level,
      pretty: pretty && !file,
      destination: file ?? (pretty ? undefined : 2),
    }),
  );
}
