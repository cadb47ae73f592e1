/**
 * Keyline Config Language — Scanner
 *
 * Turns configuration text into tokens, one per scan() call.
 *
 * Lexical rules:
 * - spaces, tabs and carriage returns form WhiteSpace tokens
 * - a newline or `;` is a Terminator
 * - `#` at the start of a token begins a Comment that runs to end of line
 * - anything else is a word, ending at whitespace, newline or `;`
 * - inside a word, `"` opens a quoted segment and `\` escapes one character;
 *   both are removed from the token text
 * - a word starting with an unquoted `--` is an Option
 *
 * Malformed input (an unterminated quote, a trailing backslash) produces an
 * Invalid token carrying a lexical error rather than a scan failure, so the
 * parser can report it at the right position and recover.
 */

import type { ScanResult, Token, TokenPosition, TokenSource } from './types.js';
import { TokenKind } from './types.js';

/** Returned by scan() once the scanner has been closed. */
export class ScannerClosedError extends Error {
  constructor() {
    super('Scanner closed');
    this.name = 'ScannerClosedError';
  }
}

const QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
};

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\r';
}

function isTerminator(char: string): boolean {
  return char === '\n' || char === ';';
}

function makeToken(
  kind: TokenKind,
  text: string,
  position: TokenPosition,
  lexError?: string,
): Token {
  return Object.freeze(
    lexError === undefined ? { kind, text, position } : { kind, text, position, lexError },
  );
}

export class ConfigScanner implements TokenSource {
  private offset = 0;
  private line = 1;
  private column = 1;
  private closed = false;

  constructor(private readonly input: string) {}

  /**
   * Close the scanner. Every later scan() fails with ScannerClosedError,
   * which stops a parser at its next read.
   */
  close(): void {
    this.closed = true;
  }

  scan(): ScanResult {
    if (this.closed) {
      return { ok: false, error: new ScannerClosedError() };
    }
    return { ok: true, token: this.nextToken() };
  }

  private peek(): string | undefined {
    return this.input[this.offset];
  }

  private advance(): void {
    if (this.input[this.offset] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }

  private nextToken(): Token {
    const position: TokenPosition = Object.freeze({ line: this.line, column: this.column });
    const char = this.peek();

    if (char === undefined) {
      return makeToken(TokenKind.EndOfInput, '', position);
    }

    if (isTerminator(char)) {
      this.advance();
      return makeToken(TokenKind.Terminator, char, position);
    }

    if (isBlank(char)) {
      return makeToken(TokenKind.WhiteSpace, this.takeWhile(isBlank), position);
    }

    if (char === '#') {
      return makeToken(TokenKind.Comment, this.takeWhile((c) => c !== '\n'), position);
    }

    return this.scanWord(position);
  }

  private takeWhile(predicate: (char: string) => boolean): string {
    const start = this.offset;
    let char = this.peek();
    while (char !== undefined && predicate(char)) {
      this.advance();
      char = this.peek();
    }
    return this.input.slice(start, this.offset);
  }

  private scanWord(position: TokenPosition): Token {
    const kind = this.input.startsWith('--', this.offset) ? TokenKind.Option : TokenKind.Word;
    let text = '';

    for (let char = this.peek(); char !== undefined; char = this.peek()) {
      if (isBlank(char) || isTerminator(char)) break;

      if (char === '\\') {
        this.advance();
        const escaped = this.peek();
        if (escaped === undefined) {
          return makeToken(TokenKind.Invalid, text, position, 'Unterminated escape sequence');
        }
        text += escaped;
        this.advance();
        continue;
      }

      if (char === '"') {
        this.advance();
        const quoted = this.scanQuoted();
        text += quoted.text;
        if (!quoted.terminated) {
          return makeToken(TokenKind.Invalid, text, position, 'Unterminated string');
        }
        continue;
      }

      text += char;
      this.advance();
    }

    return makeToken(kind, text, position);
  }

  /** Reads up to and including the closing quote. */
  private scanQuoted(): { text: string; terminated: boolean } {
    let text = '';

    for (let char = this.peek(); char !== undefined; char = this.peek()) {
      this.advance();

      if (char === '"') {
        return { text, terminated: true };
      }

      if (char === '\\') {
        const escaped = this.peek();
        if (escaped === undefined) break;
        text += QUOTED_ESCAPES[escaped] ?? escaped;
        this.advance();
        continue;
      }

      text += char;
    }

    return { text, terminated: false };
  }
}
