/**
 * Keyline Config Language — Diagnostic Sink Interface
 *
 * Defines the injection point for persisting parse diagnostics.
 *
 * This package owns the contract and the DiagnosticLogger class. Concrete
 * sinks live in the runtime host and are injected at construction time, so
 * nothing in this package touches the filesystem.
 */

import type { ConfigErrorKind } from '../types.js';

/** One recorded parse diagnostic. */
export interface DiagnosticEntry {
  /** ISO 8601 time the diagnostic was recorded. */
  readonly timestamp: string;
  /** Source label of the parser that produced it ('' for interactive input). */
  readonly source: string;
  readonly line: number | null;
  readonly column: number | null;
  readonly kind: ConfigErrorKind;
  /** Fully rendered diagnostic line. */
  readonly message: string;
}

/**
 * A sink that receives and persists diagnostic entries.
 *
 * append() must finish before it returns; implementations must not drop
 * entries silently.
 */
export interface DiagnosticSink {
  append(entry: DiagnosticEntry): void;
}
