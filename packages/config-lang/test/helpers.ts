/**
 * Shared test fixtures for @keyline/config-lang.
 */

import { ConfigParser } from '../src/parser.js';
import { ConfigScanner } from '../src/scanner.js';
import type { ConfigCommand, ConfigError, ParseResult, ScanResult, Token, TokenSource } from '../src/types.js';
import { TokenKind } from '../src/types.js';

export const SOURCE = 'test.rc';

export function parserFor(text: string, source = SOURCE): ConfigParser {
  return new ConfigParser(new ConfigScanner(text), source);
}

export function expectCommand(result: ParseResult): ConfigCommand {
  if (!result.ok || result.command === null) {
    throw new Error(`expected a command, got ${JSON.stringify(result)}`);
  }
  return result.command;
}

export function expectError(result: ParseResult): ConfigError {
  if (result.ok) {
    throw new Error(`expected an error, got ${JSON.stringify(result)}`);
  }
  return result.error;
}

/** Parse `text` to end of input, collecting commands and errors in order. */
export function parseAll(text: string, source = SOURCE): Array<ConfigCommand | ConfigError> {
  const parser = parserFor(text, source);
  const out: Array<ConfigCommand | ConfigError> = [];
  for (;;) {
    const result = parser.parseNext();
    if (result.ok) {
      if (result.command === null) return out;
      out.push(result.command);
    } else {
      out.push(result.error);
      if (result.eof) return out;
    }
  }
}

export function tok(kind: TokenKind, text: string, column = 1, lexError?: string): Token {
  const position = { line: 1, column };
  return lexError === undefined ? { kind, text, position } : { kind, text, position, lexError };
}

/**
 * Replays a fixed script of tokens and source failures, then reports
 * EndOfInput forever.
 */
export class ScriptedTokenSource implements TokenSource {
  private index = 0;
  reads = 0;

  constructor(private readonly script: ReadonlyArray<Token | Error>) {}

  scan(): ScanResult {
    this.reads++;
    const next = this.script[this.index];
    if (next === undefined) {
      return { ok: true, token: tok(TokenKind.EndOfInput, '', 99) };
    }
    this.index++;
    return next instanceof Error ? { ok: false, error: next } : { ok: true, token: next };
  }
}
