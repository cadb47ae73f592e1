/**
 * Keyline Config Language — Diagnostic Logger
 *
 * Turns ConfigErrors into DiagnosticEntries and forwards them to an injected
 * sink. Without a sink (tests, embedded use) record() is a no-op.
 */

import { renderConfigError } from '../errors.js';
import type { ConfigError } from '../types.js';
import type { DiagnosticEntry, DiagnosticSink } from './diagnostic-sink.js';

export class DiagnosticLogger {
  /**
   * @param sink - Where entries are persisted; omit to discard them
   * @param clock - Timestamp source, injectable for deterministic tests
   */
  constructor(
    private readonly sink?: DiagnosticSink,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  /** Record one parse error. Returns the entry that was forwarded. */
  record(error: ConfigError): DiagnosticEntry {
    const entry: DiagnosticEntry = {
      timestamp: this.clock(),
      source: error.source,
      line: error.position?.line ?? null,
      column: error.position?.column ?? null,
      kind: error.kind,
      message: renderConfigError(error),
    };
    this.sink?.append(entry);
    return entry;
  }
}
