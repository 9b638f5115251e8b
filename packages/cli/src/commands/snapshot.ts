import { Command } from 'commander';
import { detectIssues } from '@tickscope/core';
import { renderTextBlock } from '../ui/Dashboard.js';
import type { CollectorFlags } from '../utils/config.js';
import { collectOnce, openSession, withCollectorOptions } from '../utils/session.js';

interface SnapshotOptions extends CollectorFlags {
  json?: boolean;
}

export const snapshotCommand = withCollectorOptions(
  new Command('snapshot').description('Take two readings one interval apart and print the second'),
)
  .option('--json', 'Print the snapshot and its issues as JSON')
  .action(async (options: SnapshotOptions) => {
    const session = openSession(options);
    if (!session) return;

    const snapshot = await collectOnce(session.collector, session.config.interval);
    const issues = detectIssues(snapshot);

    if (options.json) {
      console.log(JSON.stringify({ ...snapshot, issues }, null, 2));
    } else {
      console.log(renderTextBlock(snapshot, issues));
    }
  });
