/**
 * Keyline Runtime Host — FileDiagnosticSink and ULID Tests
 *
 *   LOG-1: each diagnostic becomes one JSONL line with an event_id
 *   LOG-2: two appended entries have distinct event_ids
 *   LOG-3: FileLogIO writes under <home>/logs and reads back what it wrote
 *   ULID-1: ids are 26 Crockford Base32 characters
 *   ULID-2: ids from one generator increase within the same millisecond
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DiagnosticEntry } from '@keyline/config-lang';
import { DIAGNOSTICS_LOG, FileDiagnosticSink } from '../src/logging/file-diagnostic-sink.js';
import { FileLogIO, MemoryLogIO } from '../src/logging/log-io.js';
import { createUlidGenerator, ulid } from '../src/logging/ulid.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ENTRY: DiagnosticEntry = {
  timestamp: '2026-01-01T00:00:00.000Z',
  source: 'keylinerc',
  line: 3,
  column: 1,
  kind: 'unknown-command',
  message: 'keylinerc:3:1 Invalid command "bogus"',
};

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

// ---------------------------------------------------------------------------
// FileDiagnosticSink
// ---------------------------------------------------------------------------

describe('FileDiagnosticSink', () => {
  it('LOG-1: writes one JSONL line per entry', () => {
    const logIO = new MemoryLogIO();
    const sink = new FileDiagnosticSink(logIO, () => '01HZZZZZZZZZZZZZZZZZZZZZZZ');

    sink.append(ENTRY);

    expect(logIO.readLines(DIAGNOSTICS_LOG)).toEqual([
      '{"event_id":"01HZZZZZZZZZZZZZZZZZZZZZZZ","timestamp":"2026-01-01T00:00:00.000Z",' +
        '"source":"keylinerc","line":3,"column":1,"kind":"unknown-command",' +
        '"message":"keylinerc:3:1 Invalid command \\"bogus\\""}',
    ]);
  });

  it('LOG-2: gives every entry its own event_id', () => {
    const logIO = new MemoryLogIO();
    const sink = new FileDiagnosticSink(logIO);

    sink.append(ENTRY);
    sink.append(ENTRY);

    const ids = logIO.readLines(DIAGNOSTICS_LOG).map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'event_id') : undefined;
    });
    expect(ids).toHaveLength(2);
    expect(ids[0]).toMatch(ULID_PATTERN);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('LOG-3: FileLogIO appends under <home>/logs', () => {
    const home = mkdtempSync(join(tmpdir(), 'keyline-log-'));
    const logIO = new FileLogIO(home);

    expect(logIO.readLogRaw(DIAGNOSTICS_LOG)).toBe('');

    logIO.appendLine(DIAGNOSTICS_LOG, '{"a":1}');
    logIO.appendLine(DIAGNOSTICS_LOG, '{"a":2}');

    expect(logIO.readLogRaw(DIAGNOSTICS_LOG)).toBe('{"a":1}\n{"a":2}\n');
    expect(new FileLogIO(home).readLogRaw(DIAGNOSTICS_LOG)).toBe('{"a":1}\n{"a":2}\n');
  });
});

// ---------------------------------------------------------------------------
// ULID
// ---------------------------------------------------------------------------

describe('ulid', () => {
  it('ULID-1: produces 26 Crockford Base32 characters', () => {
    expect(ulid()).toMatch(ULID_PATTERN);
  });

  it('ULID-1: encodes the timestamp in the first ten characters', () => {
    const next = createUlidGenerator({ now: () => 0, random: (size) => new Uint8Array(size) });

    expect(next()).toBe('00000000000000000000000000');
  });

  it('ULID-2: increments the random part within one millisecond', () => {
    const next = createUlidGenerator({ now: () => 1, random: (size) => new Uint8Array(size) });

    expect(next()).toBe('00000000010000000000000000');
    expect(next()).toBe('00000000010000000000000001');
  });

  it('ULID-2: redraws randomness when the clock moves', () => {
    let time = 1;
    const next = createUlidGenerator({ now: () => time, random: (size) => new Uint8Array(size).fill(255) });

    const first = next();
    time = 2;
    const second = next();

    expect(first).toBe('0000000001ZZZZZZZZZZZZZZZZ');
    expect(second).toBe('0000000002ZZZZZZZZZZZZZZZZ');
    expect(first < second).toBe(true);
  });

  it('ULID-2: keeps increasing when the clock steps back', () => {
    let time = 5;
    const next = createUlidGenerator({ now: () => time, random: (size) => new Uint8Array(size) });

    const first = next();
    time = 3;
    const second = next();

    expect(first).toBe('00000000050000000000000000');
    expect(second).toBe('00000000050000000000000001');
    expect(first < second).toBe(true);
  });

  it('ULID-2: moves to the next millisecond when the random part is exhausted', () => {
    const next = createUlidGenerator({ now: () => 1, random: (size) => new Uint8Array(size).fill(255) });

    const first = next();
    const second = next();

    expect(first).toBe('0000000001ZZZZZZZZZZZZZZZZ');
    expect(second).toBe('0000000002ZZZZZZZZZZZZZZZZ');
  });
});
