/**
 * Keyline Runtime Host — Configuration Loader
 *
 * Drives a ConfigParser to end of input and collects every command and
 * every error in stream order. Each error is recorded through the injected
 * DiagnosticLogger before loading continues with the next command.
 *
 * A token-source failure ends loading: the stream is broken and further
 * reads would fail the same way.
 */

import { readFileSync } from 'node:fs';
import {
  ConfigParser,
  ConfigScanner,
  DiagnosticLogger,
  scannerError,
} from '@keyline/config-lang';
import type { CommandRegistry, ConfigCommand, ConfigError } from '@keyline/config-lang';
import { isNodeError } from './logging/log-io.js';

export interface LoadResult {
  readonly commands: ReadonlyArray<ConfigCommand>;
  readonly errors: ReadonlyArray<ConfigError>;
}

export interface LoadConfigOptions {
  /** Source label used in diagnostics; '' for interactive input. */
  readonly source: string;
  readonly text: string;
  readonly logger?: DiagnosticLogger | undefined;
  readonly registry?: CommandRegistry | undefined;
}

/**
 * Parse configuration text to end of input.
 */
export function loadConfig(opts: LoadConfigOptions): LoadResult {
  const logger = opts.logger ?? new DiagnosticLogger();
  const parser = new ConfigParser(new ConfigScanner(opts.text), opts.source, {
    registry: opts.registry,
  });
  const commands: ConfigCommand[] = [];
  const errors: ConfigError[] = [];

  for (;;) {
    const result = parser.parseNext();

    if (result.ok) {
      if (result.command === null) break;
      commands.push(result.command);
      continue;
    }

    errors.push(result.error);
    logger.record(result.error);
    if (result.eof || result.error.kind === 'scanner') break;
  }

  return { commands, errors };
}

export interface LoadConfigFileOptions {
  /** Source label; defaults to the file path. */
  readonly source?: string | undefined;
  readonly logger?: DiagnosticLogger | undefined;
  readonly registry?: CommandRegistry | undefined;
}

/**
 * Read and parse a configuration file.
 *
 * A missing file is not an error: it yields no commands. Any other read
 * failure is returned (and logged) as a scanner error.
 */
export function loadConfigFile(path: string, opts?: LoadConfigFileOptions): LoadResult {
  const source = opts?.source ?? path;
  let text: string;

  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return { commands: [], errors: [] };
    }
    const error = scannerError(source, err instanceof Error ? err : new Error(String(err)));
    opts?.logger?.record(error);
    return { commands: [], errors: [error] };
  }

  return loadConfig({ source, text, logger: opts?.logger, registry: opts?.registry });
}
