/**
 * runtime.ts — wiring shared by the CLI commands and the interactive shell.
 *
 * Resolves the home directory and builds a DiagnosticLogger that persists
 * to <home>/logs/diagnostics.jsonl.
 */

import { DiagnosticLogger } from '@keyline/config-lang'
import { FileDiagnosticSink, FileLogIO, resolveKeylineHome } from '@keyline/runtime-host'

export interface CliRuntime {
  readonly home: string
  readonly logIO: FileLogIO
  readonly logger: DiagnosticLogger
}

/**
 * @param home - Value of the --home flag, if given
 * @param log - When false, diagnostics are not persisted
 */
export function buildRuntime(home?: string, log = true): CliRuntime {
  const resolved = resolveKeylineHome({ home })
  const logIO = new FileLogIO(resolved)
  const logger = log ? new DiagnosticLogger(new FileDiagnosticSink(logIO)) : new DiagnosticLogger()
  return { home: resolved, logIO, logger }
}
