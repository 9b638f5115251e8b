import { Command } from 'commander';
import chalk from 'chalk';
import type { HostFs } from '@tickscope/core';
import { Collector, ProcHostFs } from '@tickscope/core';
import type { ResolvedConfig, SamplerStatus } from '@tickscope/shared';
import {
  PROC_DISKSTATS,
  PROC_INTERRUPTS,
  PROC_MEMINFO,
  PROC_ROOT,
  PROC_STAT,
  PROC_VMSTAT,
  SYS_BLOCK,
  SYS_NUMA_NODES,
} from '@tickscope/shared';
import { loadConfig, setupLogging } from '../utils/config.js';
import { colorSamplerState } from '../utils/format.js';
import { reportConfigError } from '../utils/session.js';

export interface SourceCheck {
  path: string;
  purpose: string;
  /** Optional sources only degrade a sampler; missing required ones disable it. */
  required: boolean;
  present: boolean;
}

const SOURCES: Omit<SourceCheck, 'present'>[] = [
  { path: PROC_STAT, purpose: 'CPU time accounting', required: true },
  { path: PROC_INTERRUPTS, purpose: 'interrupt distribution', required: false },
  { path: PROC_MEMINFO, purpose: 'memory accounting', required: true },
  { path: PROC_DISKSTATS, purpose: 'block device counters', required: true },
  { path: SYS_BLOCK, purpose: 'block device discovery', required: true },
  { path: PROC_VMSTAT, purpose: 'VM paging counters', required: true },
  { path: SYS_NUMA_NODES, purpose: 'NUMA topology (falls back to one node)', required: false },
  { path: PROC_ROOT, purpose: 'per-process accounting', required: true },
];

export function checkSources(fs: HostFs): SourceCheck[] {
  return SOURCES.map((source) => ({ ...source, present: fs.exists(source.path) }));
}

/** Open every sampler, enabled or not, and report how each one fared. */
export function probeSamplers(config: ResolvedConfig, fs: HostFs): SamplerStatus[] {
  const collector = new Collector({
    config: {
      ...config,
      samplers: { cpu: true, memory: true, storage: true, numa: true, perf: true, process: true },
    },
    fs,
  });
  collector.initialize();
  const statuses = collector.getSamplers().map((sampler) => sampler.getStatus());
  collector.close();
  return statuses;
}

export const doctorCommand = new Command('doctor')
  .description('Report which counter sources and samplers are usable on this host')
  .option('-c, --config <path>', 'Config file (default: ./tickscope.config.json)')
  .option('--host-root <path>', 'Read /proc and /sys below this root')
  .action((options: { config?: string; hostRoot?: string }) => {
    let config: ResolvedConfig;
    try {
      config = loadConfig({ config: options.config, hostRoot: options.hostRoot, logLevel: 'fatal' });
    } catch (err) {
      reportConfigError(err);
      return;
    }
    setupLogging(config);

    const fs = new ProcHostFs(config.hostRoot);
    console.log(chalk.bold(`\n  tickscope doctor`) + chalk.gray(`  (host root: ${config.hostRoot})\n`));

    for (const check of checkSources(fs)) {
      if (check.present) {
        console.log(chalk.green(`  ✓ ${check.path}`) + chalk.gray(`  ${check.purpose}`));
      } else if (check.required) {
        console.log(chalk.red(`  ✗ ${check.path}`) + chalk.gray(`  ${check.purpose}`));
      } else {
        console.log(chalk.yellow(`  ⚠ ${check.path}`) + chalk.gray(`  ${check.purpose}`));
      }
    }

    console.log(chalk.bold('\n  Samplers\n'));
    const statuses = probeSamplers(config, fs);
    for (const status of statuses) {
      const detail = status.lastError ? chalk.gray(`  ${status.lastError}`) : '';
      const enabled = config.samplers[status.name] ? '' : chalk.gray(' (not enabled in config)');
      console.log(`  ${status.name.padEnd(8)} ${colorSamplerState(status.state)}${enabled}${detail}`);
    }

    const ready = statuses.filter((status) => status.state === 'ready').length;
    console.log('');
    if (ready === 0) {
      console.log(chalk.red('  No sampler can run on this host.\n'));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`  ${ready} of ${statuses.length} samplers usable.\n`));
    }
  });
