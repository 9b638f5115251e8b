import { Command } from 'commander';
import chalk from 'chalk';
import { detectIssues } from '@tickscope/core';
import { renderTextBlock } from '../ui/Dashboard.js';
import type { CollectorFlags } from '../utils/config.js';
import { abortOnSignals, collectOnce, openSession, withCollectorOptions } from '../utils/session.js';

interface WatchOptions extends CollectorFlags {
  once?: boolean;
}

export const watchCommand = withCollectorOptions(
  new Command('watch').description('Print one text block per tick until interrupted'),
)
  .option('--once', 'Print a single block after two ticks and exit')
  .action(async (options: WatchOptions) => {
    const session = openSession(options);
    if (!session) return;
    const { config, collector } = session;

    if (options.once) {
      const snapshot = await collectOnce(collector, config.interval);
      console.log(renderTextBlock(snapshot, detectIssues(snapshot)));
      return;
    }

    collector.eventBus.on('sampler:disabled', (event) => {
      console.log(chalk.yellow(`  ${event.sampler} sampler disabled: ${event.message}`));
    });

    const controller = abortOnSignals();
    await collector.run(controller.signal, (snapshot) => {
      console.log(renderTextBlock(snapshot, detectIssues(snapshot)));
      console.log('');
    });
  });
