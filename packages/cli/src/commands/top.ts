import { Command } from 'commander';
import chalk from 'chalk';
import { detectIssues } from '@tickscope/core';
import type { HostSnapshot } from '@tickscope/shared';
import { Dashboard, VIEWS, isViewName } from '../ui/Dashboard.js';
import type { CollectorFlags } from '../utils/config.js';
import { abortOnSignals, openSession, withCollectorOptions } from '../utils/session.js';

interface TopOptions extends CollectorFlags {
  view: string;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Keys 1-5 pick a view, q or Ctrl+C quits. Only active on a TTY; returns a
 * function that restores the terminal.
 */
function bindKeys(dashboard: Dashboard, controller: AbortController, redraw: () => void): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => {};

  const onData = (data: Buffer): void => {
    const key = data.toString();
    if (key === 'q' || key === '\u0003') {
      controller.abort();
      return;
    }
    const view = VIEWS[Number(key) - 1];
    if (view) {
      dashboard.setView(view);
      redraw();
    }
  };

  stdin.setRawMode(true);
  stdin.resume();
  stdin.on('data', onData);
  return () => {
    stdin.off('data', onData);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

export const topCommand = withCollectorOptions(
  new Command('top').description('Full-screen dashboard, redrawn every tick'),
)
  .option('--view <view>', `Initial view (${VIEWS.join('|')})`, 'overview')
  .action(async (options: TopOptions) => {
    if (!isViewName(options.view)) {
      console.error(chalk.red(`\n  Unknown view "${options.view}". Expected one of: ${VIEWS.join(', ')}\n`));
      process.exitCode = 1;
      return;
    }

    const session = openSession(options);
    if (!session) return;

    const dashboard = new Dashboard(options.view, session.config.interval);
    let latest: HostSnapshot | null = null;
    const draw = (): void => {
      if (!latest) return;
      process.stdout.write(CLEAR_SCREEN);
      console.log(dashboard.render(latest, detectIssues(latest)));
    };

    const controller = abortOnSignals();
    const release = bindKeys(dashboard, controller, draw);
    try {
      await session.collector.run(controller.signal, (snapshot) => {
        latest = snapshot;
        dashboard.record(snapshot);
        draw();
      });
    } finally {
      release();
    }
  });
