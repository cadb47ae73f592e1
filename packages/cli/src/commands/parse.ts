/**
 * keyline parse — Print the commands parsed from a configuration file
 *
 * Human-readable output is one canonical command line per command;
 * --json prints every command with token text and positions.
 * Errors go to stderr and set exit status 1.
 */

import { Command } from 'commander';
import { formatCommand, renderConfigError } from '@keyline/config-lang';
import { loadConfigFile, startupConfigPath } from '@keyline/runtime-host';
import { buildRuntime } from '../runtime.js';
import { commandToJson } from '../tui/output/command.js';

export function createParseCommand(): Command {
  return new Command('parse')
    .description('Print the commands parsed from a configuration file')
    .argument('[file]', 'Configuration file (default: <home>/keylinerc)')
    .option('--home <dir>', 'Keyline home directory')
    .option('--json', 'Output as JSON')
    .option('--no-log', 'Do not record diagnostics')
    .action((file: string | undefined, options: { home?: string; json?: boolean; log: boolean }) => {
      const { home, logger } = buildRuntime(options.home, options.log);
      const path = file ?? startupConfigPath(home);

      const { commands, errors } = loadConfigFile(path, { logger });

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          source: path,
          commands: commands.map(commandToJson),
          errors: errors.map((error) => ({
            kind: error.kind,
            line: error.position?.line ?? null,
            column: error.position?.column ?? null,
            message: renderConfigError(error),
          })),
        }, null, 2));
      } else {
        for (const command of commands) {
          // eslint-disable-next-line no-console
          console.log(formatCommand(command));
        }
        for (const error of errors) {
          process.stderr.write(renderConfigError(error) + '\n');
        }
      }

      if (errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
