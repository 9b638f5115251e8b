import { setTimeout as delay } from 'node:timers/promises';
import chalk from 'chalk';
import type { Command } from 'commander';
import { Collector } from '@tickscope/core';
import type { HostSnapshot, ResolvedConfig } from '@tickscope/shared';
import { ConfigValidationError } from '@tickscope/shared';
import type { CollectorFlags } from './config.js';
import { loadConfig, setupLogging } from './config.js';

/** Options every collecting command accepts. */
export function withCollectorOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: ./tickscope.config.json)')
    .option('-i, --interval <duration>', 'Sampling interval, e.g. 500ms, 2s')
    .option('--host-root <path>', 'Read /proc and /sys below this root')
    .option('--perf', 'Enable hardware performance counters')
    .option('--perf-source <kind>', 'Counter source for --perf (unavailable|simulated)')
    .option('--numa', 'Enable NUMA topology and memory pressure')
    .option('--process', 'Enable per-process accounting')
    .option('--log-level <level>', 'Log level (trace|debug|info|warn|error|fatal)')
    .option('--log-file <path>', 'Write logs to a file instead of stderr');
}

export function reportConfigError(err: unknown): void {
  if (err instanceof ConfigValidationError) {
    console.error(chalk.red('\n  Invalid configuration:'));
    for (const issue of err.errors) {
      console.error(chalk.red(`    - ${issue}`));
    }
    console.error();
  } else {
    console.error(chalk.red(`\n  ${err instanceof Error ? err.message : String(err)}\n`));
  }
  process.exitCode = 1;
}

export interface Session {
  config: ResolvedConfig;
  collector: Collector;
}

/**
 * Resolve config, route logging and open every enabled sampler. Returns null
 * (with the exit code set) when the config is invalid or nothing is usable.
 */
export function openSession(flags: CollectorFlags): Session | null {
  let config: ResolvedConfig;
  try {
    config = loadConfig(flags);
  } catch (err) {
    reportConfigError(err);
    return null;
  }

  setupLogging(config);
  const collector = new Collector({ config });

  if (collector.initialize() === 0) {
    console.error(chalk.red('\n  No sampler could be initialized. Run `tickscope doctor` for details.\n'));
    collector.close();
    process.exitCode = 1;
    return null;
  }

  return { config, collector };
}

/** An AbortController that SIGINT or SIGTERM aborts. */
export function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  controller.signal.addEventListener('abort', () => {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  });
  return controller;
}

/**
 * Two ticks one interval apart, so rates and percentages exist; returns the
 * second snapshot and closes the collector.
 */
export async function collectOnce(collector: Collector, interval: number): Promise<HostSnapshot> {
  try {
    collector.tick();
    await delay(interval);
    return collector.tick();
  } finally {
    collector.close();
  }
}
