import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { TickscopeConfigInput } from '@tickscope/shared';
import { DEFAULT_HOST_ROOT, DEFAULT_INTERVAL, TICKSCOPE_CONFIG_FILES } from '@tickscope/shared';

export function configTemplate(full: boolean): TickscopeConfigInput {
  const basic: TickscopeConfigInput = {
    interval: DEFAULT_INTERVAL,
    hostRoot: DEFAULT_HOST_ROOT,
    samplers: { cpu: true, memory: true, storage: true, numa: false, perf: false, process: false },
  };
  if (!full) return basic;

  return {
    ...basic,
    storage: { hotFraction: 0.25, bottleneckQueueDepth: 100, warningQueueDepth: 50 },
    numa: { imbalancePercent: 30, criticalScore: 50 },
    perf: { source: 'unavailable', cacheThrashingHitRate: 80, branchMissRate: 5 },
    process: { cpuPercent: 50, memoryMb: 1000, topCount: 10 },
    log: { level: 'info', pretty: false },
  };
}

export const initCommand = new Command('init')
  .option('--template <template>', 'Config template (basic, full)', 'basic')
  .description(`Generate a ${TICKSCOPE_CONFIG_FILES[0]} in the current directory`)
  .action((options: { template: string }) => {
    const configPath = resolve(TICKSCOPE_CONFIG_FILES[0]);

    if (existsSync(configPath)) {
      console.log(chalk.yellow(`\n  Config file already exists: ${configPath}\n`));
      return;
    }

    const template = configTemplate(options.template === 'full');
    writeFileSync(configPath, `${JSON.stringify(template, null, 2)}\n`);

    console.log(chalk.green(`\n  Created ${configPath}`));
    console.log(chalk.gray(`  Edit it and run: tickscope watch\n`));
  });
