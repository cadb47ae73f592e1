/**
 * Keyline Config Language — Parser
 *
 * Pulls tokens from a TokenSource and produces one ConfigCommand per
 * parseNext() call.
 *
 * Parser guarantees:
 * - Rejecting: a malformed command produces a ConfigError, never a partial
 *   command
 * - Recovering: after an error the remaining tokens of the failed command
 *   are discarded, so the next call starts at a command boundary
 * - Non-throwing: every failure is returned as a value
 *
 * The parser holds no memory of earlier commands. Its only state is the
 * token source, the source label used in diagnostics, and whether the last
 * token it consumed was a command boundary.
 */

import { generateConfigError, quote, scannerError } from './errors.js';
import { COMMAND_REGISTRY, lookupCommand } from './grammar.js';
import type {
  CommandDescriptor,
  CommandRegistry,
  ConfigError,
  ConfigErrorKind,
  ParseResult,
  ScanResult,
  Token,
  TokenSource,
} from './types.js';
import { TokenKind, tokenKindName } from './types.js';

export interface ConfigParserOptions {
  /** Grammar to parse against. Default: COMMAND_REGISTRY. */
  readonly registry?: CommandRegistry | undefined;
}

/** Internal: outcome of reading the argument tokens of one command. */
type ArgumentsResult =
  | { readonly ok: true; readonly tokens: ReadonlyArray<Token> }
  | { readonly ok: false; readonly error: ConfigError; readonly eof: boolean };

export class ConfigParser {
  private readonly registry: CommandRegistry;
  private atBoundary = true;

  /**
   * @param tokens - Token source; owned by this parser from now on
   * @param inputSource - Label used in diagnostics (a file path, or '' for
   *   interactive input, which drops the position prefix)
   */
  constructor(
    private readonly tokens: TokenSource,
    private readonly inputSource: string,
    options?: ConfigParserOptions,
  ) {
    this.registry = options?.registry ?? COMMAND_REGISTRY;
  }

  /** The label this parser attributes its diagnostics to. */
  getInputSource(): string {
    return this.inputSource;
  }

  /**
   * Parse the next command.
   *
   * Terminators with no preceding command are skipped. When the token
   * source itself fails before a command starts, the failure is returned
   * without recovery: the stream is considered broken.
   */
  parseNext(): ParseResult {
    for (;;) {
      const scanned = this.scan();
      if (!scanned.ok) {
        return { ok: false, error: scannerError(this.inputSource, scanned.error), eof: false };
      }

      const token = scanned.token;
      switch (token.kind) {
        case TokenKind.Word:
          return this.parseCommand(token);
        case TokenKind.Terminator:
          continue;
        case TokenKind.EndOfInput:
          return { ok: true, command: null, eof: true };
        case TokenKind.Option:
          return this.fail(this.error(token, 'grammar', `Unexpected Option ${quote(token.text)}`));
        case TokenKind.Invalid:
          return this.fail(this.error(token, 'lexical', 'Syntax Error'));
        default:
          return this.fail(this.error(token, 'grammar', `Unexpected token ${quote(token.text)}`));
      }
    }
  }

  // -------------------------------------------------------------------------
  // Command dispatch
  // -------------------------------------------------------------------------

  private parseCommand(commandToken: Token): ParseResult {
    const descriptor = lookupCommand(commandToken.text, this.registry);
    if (descriptor === undefined) {
      return this.fail(
        this.error(commandToken, 'unknown-command', `Invalid command ${quote(commandToken.text)}`),
      );
    }

    const args = descriptor.varArgs
      ? this.readVarArgs()
      : this.readFixedArgs(descriptor);

    if (!args.ok) {
      return this.fail(args.error, args.eof);
    }

    const result = descriptor.build(commandToken, args.tokens, (token, kind, message) =>
      this.error(token, kind, message),
    );
    if (!result.ok) {
      return this.fail(result.error);
    }

    return { ok: true, command: result.command, eof: false };
  }

  /**
   * Match the descriptor's token kinds exactly, then require a command
   * boundary so surplus tokens are rejected rather than read as the next
   * command.
   */
  private readFixedArgs(descriptor: CommandDescriptor): ArgumentsResult {
    const matched: Token[] = [];

    for (const expected of descriptor.tokenKinds) {
      const scanned = this.scan();
      if (!scanned.ok) {
        return { ok: false, error: scannerError(this.inputSource, scanned.error), eof: false };
      }

      const token = scanned.token;
      if (token.lexError !== undefined) {
        return { ok: false, error: this.error(token, 'lexical', 'Syntax Error'), eof: false };
      }
      if (token.kind === TokenKind.EndOfInput) {
        return { ok: false, error: this.error(token, 'unexpected-eof', 'Unexpected EOF'), eof: true };
      }
      if (token.kind !== expected) {
        return {
          ok: false,
          error: this.error(
            token,
            'grammar',
            `Expected ${tokenKindName(expected)} but got ${tokenKindName(token.kind)}: ${quote(token.text)}`,
          ),
          eof: false,
        };
      }

      matched.push(token);
    }

    const trailing = this.scan();
    if (!trailing.ok) {
      return { ok: false, error: scannerError(this.inputSource, trailing.error), eof: false };
    }
    const next = trailing.token;
    if (next.kind !== TokenKind.Terminator && next.kind !== TokenKind.EndOfInput) {
      return {
        ok: false,
        error: this.error(
          next,
          next.lexError === undefined ? 'grammar' : 'lexical',
          `Expected Terminator but got ${tokenKindName(next.kind)}: ${quote(next.text)}`,
        ),
        eof: false,
      };
    }

    return { ok: true, tokens: Object.freeze(matched) };
  }

  /** Accumulate every token up to the next Terminator or EndOfInput. */
  private readVarArgs(): ArgumentsResult {
    const accumulated: Token[] = [];

    for (;;) {
      const scanned = this.scan();
      if (!scanned.ok) {
        return { ok: false, error: scannerError(this.inputSource, scanned.error), eof: false };
      }

      const token = scanned.token;
      if (token.lexError !== undefined) {
        return { ok: false, error: this.error(token, 'lexical', 'Syntax Error'), eof: false };
      }
      if (token.kind === TokenKind.Terminator || token.kind === TokenKind.EndOfInput) {
        return { ok: true, tokens: Object.freeze(accumulated) };
      }

      accumulated.push(token);
    }
  }

  // -------------------------------------------------------------------------
  // Scanning, errors and recovery
  // -------------------------------------------------------------------------

  /** Read the next token that is neither WhiteSpace nor a Comment. */
  private scan(): ScanResult {
    for (;;) {
      const scanned = this.tokens.scan();
      if (!scanned.ok) {
        return scanned;
      }

      const { kind } = scanned.token;
      if (kind === TokenKind.WhiteSpace || kind === TokenKind.Comment) {
        continue;
      }

      this.atBoundary = kind === TokenKind.Terminator || kind === TokenKind.EndOfInput;
      return scanned;
    }
  }

  private error(token: Token, kind: ConfigErrorKind, message: string): ConfigError {
    return generateConfigError(this.inputSource, token, kind, message);
  }

  private fail(error: ConfigError, eof = false): ParseResult {
    this.discardTokensUntilNextCommand();
    return { ok: false, error, eof };
  }

  /**
   * Discard tokens through the next Terminator or EndOfInput.
   *
   * Skipped when the token that caused the failure was itself a boundary.
   * A scanner failure ends recovery silently; the next parseNext() call
   * reports it.
   */
  private discardTokensUntilNextCommand(): void {
    while (!this.atBoundary) {
      const scanned = this.scan();
      if (!scanned.ok) {
        return;
      }
    }
  }
}
