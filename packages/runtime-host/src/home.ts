/**
 * Keyline Runtime Host — KEYLINE_HOME Resolution
 *
 * Resolves the Keyline home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. KEYLINE_HOME environment variable
 *   3. $XDG_CONFIG_HOME/keyline
 *   4. Platform default: %APPDATA%\keyline on Windows, ~/.config/keyline elsewhere
 *
 * Layout under the resolved home:
 *
 *   <KEYLINE_HOME>/
 *     keylinerc            startup configuration
 *     logs/
 *       diagnostics.jsonl  recorded parse diagnostics
 *
 * Resolution does not create the directory; FileLogIO creates `logs/` the
 * first time it writes.
 */

import { homedir, platform } from 'node:os';
import { join } from 'node:path';

/** Name of the startup configuration file inside the home directory. */
export const STARTUP_FILE = 'keylinerc';

export interface ResolveKeylineHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to consult. Default: process.env */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value !== '';
}

/** Platform default when neither an override nor the environment names a home. */
export function defaultKeylineHome(env: NodeJS.ProcessEnv = process.env): string {
  if (platform() === 'win32') {
    const appData = env['APPDATA'];
    return join(nonEmpty(appData) ? appData : join(homedir(), 'AppData', 'Roaming'), 'keyline');
  }
  return join(homedir(), '.config', 'keyline');
}

/**
 * Resolve the Keyline home directory.
 *
 * @returns The path of the resolved home directory
 */
export function resolveKeylineHome(opts?: ResolveKeylineHomeOptions): string {
  const env = opts?.env ?? process.env;

  const explicit = opts?.home;
  if (nonEmpty(explicit)) {
    return explicit;
  }

  const keylineHome = env['KEYLINE_HOME'];
  if (nonEmpty(keylineHome)) {
    return keylineHome;
  }

  const xdgConfigHome = env['XDG_CONFIG_HOME'];
  if (nonEmpty(xdgConfigHome)) {
    return join(xdgConfigHome, 'keyline');
  }

  return defaultKeylineHome(env);
}

/** Path of the startup configuration file under `home`. */
export function startupConfigPath(home: string): string {
  return join(home, STARTUP_FILE);
}
