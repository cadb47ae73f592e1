/**
 * Keyline Config Language — Scanner Tests
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { ConfigScanner, ScannerClosedError } from '../src/scanner.js';
import type { Token } from '../src/types.js';
import { TokenKind } from '../src/types.js';

function scanAll(input: string): Token[] {
  const scanner = new ConfigScanner(input);
  const tokens: Token[] = [];
  for (;;) {
    const result = scanner.scan();
    if (!result.ok) throw result.error;
    tokens.push(result.token);
    if (result.token.kind === TokenKind.EndOfInput) return tokens;
  }
}

function kindsAndText(input: string): Array<[TokenKind, string]> {
  return scanAll(input).map((token) => [token.kind, token.text]);
}

describe('ConfigScanner', () => {
  it('splits a command line into words, whitespace and a terminator', () => {
    expect(kindsAndText('set a  b\n')).toEqual([
      [TokenKind.Word, 'set'],
      [TokenKind.WhiteSpace, ' '],
      [TokenKind.Word, 'a'],
      [TokenKind.WhiteSpace, '  '],
      [TokenKind.Word, 'b'],
      [TokenKind.Terminator, '\n'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('treats a semicolon as a terminator', () => {
    expect(kindsAndText('q;rmtab')).toEqual([
      [TokenKind.Word, 'q'],
      [TokenKind.Terminator, ';'],
      [TokenKind.Word, 'rmtab'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('recognises options by a leading double dash', () => {
    expect(kindsAndText('--name -x')).toEqual([
      [TokenKind.Option, '--name'],
      [TokenKind.WhiteSpace, ' '],
      [TokenKind.Word, '-x'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('does not treat a quoted or escaped double dash as an option', () => {
    expect(kindsAndText('"--name" \\--x')).toEqual([
      [TokenKind.Word, '--name'],
      [TokenKind.WhiteSpace, ' '],
      [TokenKind.Word, '--x'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('reads a comment up to, not including, the newline', () => {
    expect(kindsAndText('# note; here\nq')).toEqual([
      [TokenKind.Comment, '# note; here'],
      [TokenKind.Terminator, '\n'],
      [TokenKind.Word, 'q'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('keeps a hash inside a word', () => {
    expect(kindsAndText('set key a#1')[4]).toEqual([TokenKind.Word, 'a#1']);
  });

  it('joins quoted and unquoted segments into one word', () => {
    expect(kindsAndText('a"b c"d')).toEqual([
      [TokenKind.Word, 'ab cd'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('decodes escapes inside quotes', () => {
    expect(kindsAndText('"tab\\there \\"q\\" \\\\ \\n"')[0]).toEqual([
      TokenKind.Word,
      'tab\there "q" \\ \n',
    ]);
  });

  it('escapes a space or semicolon outside quotes', () => {
    expect(kindsAndText('a\\ b\\;c')).toEqual([
      [TokenKind.Word, 'a b;c'],
      [TokenKind.EndOfInput, ''],
    ]);
  });

  it('reports an unterminated string as an invalid token', () => {
    const [token] = scanAll('"open ended');

    expect(token).toEqual({
      kind: TokenKind.Invalid,
      text: 'open ended',
      position: { line: 1, column: 1 },
      lexError: 'Unterminated string',
    });
  });

  it('reports a trailing backslash as an invalid token', () => {
    const tokens = scanAll('set x\\');

    expect(tokens[2]).toEqual({
      kind: TokenKind.Invalid,
      text: 'x',
      position: { line: 1, column: 5 },
      lexError: 'Unterminated escape sequence',
    });
  });

  it('tracks 1-based line and column across lines', () => {
    const positions = scanAll('q\n  set a b\n').map((token) => [
      token.text,
      token.position.line,
      token.position.column,
    ]);

    expect(positions).toEqual([
      ['q', 1, 1],
      ['\n', 1, 2],
      ['  ', 2, 1],
      ['set', 2, 3],
      [' ', 2, 6],
      ['a', 2, 7],
      [' ', 2, 8],
      ['b', 2, 9],
      ['\n', 2, 10],
      ['', 3, 1],
    ]);
  });

  it('keeps returning end of input', () => {
    const scanner = new ConfigScanner('');

    for (let i = 0; i < 3; i++) {
      const result = scanner.scan();
      expect(result.ok && result.token.kind).toBe(TokenKind.EndOfInput);
    }
  });

  it('fails every scan after close()', () => {
    const scanner = new ConfigScanner('set a b');
    scanner.close();

    const result = scanner.scan();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ScannerClosedError);
    expect(result.error.message).toBe('Scanner closed');
  });

  it('produces frozen tokens', () => {
    const [token] = scanAll('set');

    expect(Object.isFrozen(token)).toBe(true);
  });
});
