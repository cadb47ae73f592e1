/**
 * keyline check — Report every error in a configuration file
 *
 * Parses the whole file, recovering after each malformed command, and
 * prints one diagnostic per error. Exits with status 1 if any were found.
 * Diagnostics are also recorded in <home>/logs/diagnostics.jsonl unless
 * --no-log is given.
 */

import { Command } from 'commander';
import { renderConfigError } from '@keyline/config-lang';
import { loadConfigFile, startupConfigPath } from '@keyline/runtime-host';
import { buildRuntime } from '../runtime.js';

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Parse a configuration file and report every error')
    .argument('[file]', 'Configuration file (default: <home>/keylinerc)')
    .option('--home <dir>', 'Keyline home directory')
    .option('--no-log', 'Do not record diagnostics')
    .action((file: string | undefined, options: { home?: string; log: boolean }) => {
      const { home, logger } = buildRuntime(options.home, options.log);
      const path = file ?? startupConfigPath(home);

      const { commands, errors } = loadConfigFile(path, { logger });

      for (const error of errors) {
        process.stderr.write(renderConfigError(error) + '\n');
      }

      // eslint-disable-next-line no-console
      console.log(`${path}: ${commands.length} command(s), ${errors.length} error(s)`);

      if (errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
