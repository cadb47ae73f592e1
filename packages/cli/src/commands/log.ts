/**
 * keyline log — Show recorded parse diagnostics
 *
 * Reads <home>/logs/diagnostics.jsonl, drops malformed and duplicated
 * lines, and prints the most recent entries.
 */

import { Command } from 'commander';
import { DIAGNOSTICS_LOG, readDiagnostics } from '@keyline/runtime-host';
import { buildRuntime } from '../runtime.js';

export function createLogCommand(): Command {
  return new Command('log')
    .description('Show recorded parse diagnostics')
    .option('--home <dir>', 'Keyline home directory')
    .option('--limit <n>', 'Maximum number of entries to show', '20')
    .option('--json', 'Output as JSON')
    .action((options: { home?: string; limit: string; json?: boolean }) => {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        process.stderr.write(`Error: --limit must be a positive integer, got "${options.limit}"\n`);
        process.exitCode = 1;
        return;
      }

      const { logIO } = buildRuntime(options.home, false);
      const { events, stats } = readDiagnostics(logIO.readLogRaw(DIAGNOSTICS_LOG));
      const recent = events.slice(-limit);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ events: recent, stats }, null, 2));
        return;
      }

      if (recent.length === 0) {
        // eslint-disable-next-line no-console
        console.log('(no diagnostics recorded)');
        return;
      }

      for (const event of recent) {
        // eslint-disable-next-line no-console
        console.log(`${event.timestamp}  ${event.kind.padEnd(15)}  ${event.message}`);
      }

      if (stats.parseErrors > 0 || stats.partialTrailingLine) {
        process.stderr.write(
          `warning: skipped ${stats.parseErrors} malformed line(s)` +
          (stats.partialTrailingLine ? ' and a partial trailing line' : '') + '\n',
        );
      }
    });
}
