/**
 * Keyline Runtime Host — LogIO
 *
 * An injectable abstraction for appending to and reading JSONL log files.
 *
 * Two implementations are provided:
 *   - FileLogIO   — durable file I/O under `<home>/logs/`
 *   - MemoryLogIO — in-memory I/O for tests and embedded use
 *
 * Sinks and readers take a LogIO rather than touching the filesystem, so
 * they can be exercised without a home directory.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface LogIO {
  /**
   * Append a line to a log file, creating the logs directory on demand.
   * A newline is written after the line content.
   *
   * @param logfilename - Filename within the logs directory (e.g. 'diagnostics.jsonl')
   * @param line - Line content, without trailing newline
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text of a log file, or '' if it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileLogIO
// ---------------------------------------------------------------------------

/**
 * Appends to and reads from `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous, matching the parser's synchronous design. A missing log file
 * reads as empty; other I/O errors are rethrown.
 */
export class FileLogIO implements LogIO {
  constructor(private readonly homeDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryLogIO
// ---------------------------------------------------------------------------

/**
 * Keeps log lines in memory. Instances are isolated from each other.
 */
export class MemoryLogIO implements LogIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of LogIO; for assertions in tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.map((line) => line + '\n').join('');
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** True if `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
