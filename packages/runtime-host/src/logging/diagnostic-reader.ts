/**
 * Keyline Runtime Host — Diagnostic Log Reader
 *
 * Pure function over the raw text of `diagnostics.jsonl`.
 *
 * Guarantees:
 *   - lines that are not JSON objects with a string event_id, timestamp and
 *     message are dropped and counted in parseErrors
 *   - events are deduplicated by event_id; the first occurrence wins
 *   - content not ending in '\n' has its last line dropped and flagged as a
 *     partial trailing line
 *   - events keep file order
 */

export interface DiagnosticEvent {
  readonly event_id: string;
  readonly timestamp: string;
  readonly source: string;
  readonly line: number | null;
  readonly column: number | null;
  readonly kind: string;
  readonly message: string;
}

export interface DiagnosticReadStats {
  /** Non-empty lines considered, before filtering. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface DiagnosticReadResult {
  readonly events: ReadonlyArray<DiagnosticEvent>;
  readonly stats: DiagnosticReadStats;
}

function stringField(record: object, key: string): string | undefined {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' ? value : undefined;
}

function positionField(record: object, key: string): number | null {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'number' ? value : null;
}

function toEvent(line: string): DiagnosticEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }

  const eventId = stringField(parsed, 'event_id');
  const timestamp = stringField(parsed, 'timestamp');
  const message = stringField(parsed, 'message');
  if (eventId === undefined || timestamp === undefined || message === undefined) {
    return undefined;
  }

  return {
    event_id: eventId,
    timestamp,
    source: stringField(parsed, 'source') ?? '',
    line: positionField(parsed, 'line'),
    column: positionField(parsed, 'column'),
    kind: stringField(parsed, 'kind') ?? 'unknown',
    message,
  };
}

/**
 * Parse and deduplicate a diagnostics log given its raw content.
 *
 * @param rawContent - Raw JSONL text (see LogIO.readLogRaw)
 */
export function readDiagnostics(rawContent: string): DiagnosticReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const events: DiagnosticEvent[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    const event = toEvent(line);
    if (event === undefined) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
