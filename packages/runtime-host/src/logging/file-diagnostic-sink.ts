/**
 * Keyline Runtime Host — File-backed Diagnostic Sink
 *
 * Implements DiagnosticSink from @keyline/config-lang by appending one JSONL
 * line per diagnostic to `logs/diagnostics.jsonl` through an injected LogIO.
 *
 * Writes are synchronous: the entry is on disk before append() returns.
 */

import type { DiagnosticEntry, DiagnosticSink } from '@keyline/config-lang';
import type { LogIO } from './log-io.js';
import { ulid as defaultUlid } from './ulid.js';

export const DIAGNOSTICS_LOG = 'diagnostics.jsonl';

export class FileDiagnosticSink implements DiagnosticSink {
  constructor(
    private readonly logIO: LogIO,
    private readonly nextId: () => string = defaultUlid,
  ) {}

  append(entry: DiagnosticEntry): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: entry.timestamp,
      source: entry.source,
      line: entry.line,
      column: entry.column,
      kind: entry.kind,
      message: entry.message,
    });
    this.logIO.appendLine(DIAGNOSTICS_LOG, line);
  }
}
