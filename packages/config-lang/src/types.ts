/**
 * Keyline Config Language — Core Type Definitions
 *
 * This module defines the types shared by every layer of the command
 * language: tokens, the nine command variants, grammar descriptors,
 * structured errors and the result types returned by the parser.
 *
 * This package is the base layer of Keyline. The runtime host and the CLI
 * depend on it; it depends on nothing else in the workspace.
 */

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

/**
 * The closed set of token kinds produced by a token source.
 *
 * WhiteSpace and Comment are never significant to the grammar; the parser
 * skips them before it looks at a token.
 */
export enum TokenKind {
  Word = 'word',
  Option = 'option',
  WhiteSpace = 'whitespace',
  Comment = 'comment',
  Terminator = 'terminator',
  EndOfInput = 'eof',
  Invalid = 'invalid',
}

const TOKEN_KIND_NAMES: Readonly<Record<TokenKind, string>> = {
  [TokenKind.Word]: 'Word',
  [TokenKind.Option]: 'Option',
  [TokenKind.WhiteSpace]: 'WhiteSpace',
  [TokenKind.Comment]: 'Comment',
  [TokenKind.Terminator]: 'Terminator',
  [TokenKind.EndOfInput]: 'EOF',
  [TokenKind.Invalid]: 'Invalid',
};

/** Display name of a token kind, as used in grammar error messages. */
export function tokenKindName(kind: TokenKind): string {
  return TOKEN_KIND_NAMES[kind];
}

/** 1-based line and column of a token's first character. */
export interface TokenPosition {
  readonly line: number;
  readonly column: number;
}

/**
 * A single lexical token.
 *
 * Tokens are frozen values. Command variants hold tokens rather than plain
 * strings so the executor can report problems against the original text
 * and position.
 */
export interface Token {
  readonly kind: TokenKind;
  /** Literal text with quoting and escaping already removed. */
  readonly text: string;
  readonly position: TokenPosition;
  /**
   * Set when the scanner recognised malformed input but still produced a
   * placeholder token for position-accurate reporting.
   */
  readonly lexError?: string | undefined;
}

/**
 * Result of pulling one token from a token source.
 *
 * `ok: false` means the source itself is broken (closed, I/O failure), not
 * that the input was malformed.
 */
export type ScanResult =
  | { readonly ok: true; readonly token: Token }
  | { readonly ok: false; readonly error: Error };

/**
 * A pull-based source of tokens.
 *
 * Implementations: ConfigScanner (configuration text). Tests supply
 * scripted sources.
 */
export interface TokenSource {
  scan(): ScanResult;
}

// ---------------------------------------------------------------------------
// Command values
// ---------------------------------------------------------------------------

/** Every command name the grammar registry knows about. */
export type CommandName =
  | 'set'
  | 'theme'
  | 'map'
  | 'unmap'
  | 'q'
  | 'addtab'
  | 'rmtab'
  | 'addview'
  | 'vsplit'
  | 'hsplit'
  | 'split';

/** Split direction of a split-view command, derived from the command name. */
export enum ContainerOrientation {
  Dynamic = 'dynamic',
  Horizontal = 'horizontal',
  Vertical = 'vertical',
}

/** Assigns a configuration variable. */
export interface SetCommand {
  readonly type: 'set';
  readonly variable: Token;
  readonly value: Token;
}

/**
 * Sets the colours of one theme component.
 *
 * Each field is present only if its switch was supplied.
 */
export interface ThemeCommand {
  readonly type: 'theme';
  readonly name?: Token | undefined;
  readonly component?: Token | undefined;
  readonly bgcolor?: Token | undefined;
  readonly fgcolor?: Token | undefined;
}

/** Maps a key sequence to another within a view. */
export interface MapCommand {
  readonly type: 'map';
  readonly view: Token;
  readonly from: Token;
  readonly to: Token;
}

/** Removes a key mapping from a view. */
export interface UnmapCommand {
  readonly type: 'unmap';
  readonly view: Token;
  readonly from: Token;
}

export interface QuitCommand {
  readonly type: 'quit';
}

/** Creates a new tab. */
export interface NewTabCommand {
  readonly type: 'newTab';
  readonly tabName: Token;
}

/** Removes the active tab. */
export interface RemoveTabCommand {
  readonly type: 'removeTab';
}

/** Adds a view to the active tab. */
export interface AddViewCommand {
  readonly type: 'addView';
  readonly view: Token;
  readonly args: ReadonlyArray<Token>;
}

/** Splits the active view with a new view. */
export interface SplitViewCommand {
  readonly type: 'splitView';
  readonly orientation: ContainerOrientation;
  readonly view: Token;
  readonly args: ReadonlyArray<Token>;
}

/** A parsed configuration command, ready for the executor. */
export type ConfigCommand =
  | SetCommand
  | ThemeCommand
  | MapCommand
  | UnmapCommand
  | QuitCommand
  | NewTabCommand
  | RemoveTabCommand
  | AddViewCommand
  | SplitViewCommand;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Classification of a parse failure.
 *
 * - `lexical`          a token carried an embedded lexical error
 * - `scanner`          the token source failed
 * - `unknown-command`  the leading word is not a registered command
 * - `grammar`          wrong token kind, count or position
 * - `unexpected-eof`   input ended inside a command
 * - `usage`            a command-specific constraint was violated
 * - `internal`         registry and constructor disagree
 */
export type ConfigErrorKind =
  | 'lexical'
  | 'scanner'
  | 'unknown-command'
  | 'grammar'
  | 'unexpected-eof'
  | 'usage'
  | 'internal';

/**
 * A structured parse error.
 *
 * `position` is absent only for scanner failures, which have no token to
 * attribute. Render with renderConfigError().
 */
export interface ConfigError {
  readonly kind: ConfigErrorKind;
  readonly source: string;
  readonly position?: TokenPosition | undefined;
  readonly message: string;
  readonly lexError?: string | undefined;
}

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

/**
 * Result of a command constructor.
 */
export type BuildResult =
  | { readonly ok: true; readonly command: ConfigCommand }
  | { readonly ok: false; readonly error: ConfigError };

/**
 * Creates a positioned error attributed to the parser's source label.
 * Handed to constructors so every error goes through one formatting path.
 */
export type ErrorFactory = (token: Token, kind: ConfigErrorKind, message: string) => ConfigError;

/**
 * Builds a command value from the command-name token and the tokens the
 * grammar matched (fixed) or accumulated (variable).
 */
export type CommandConstructor = (
  commandToken: Token,
  tokens: ReadonlyArray<Token>,
  fail: ErrorFactory,
) => BuildResult;

/**
 * Grammar of one command.
 *
 * `tokenKinds` is the exact kind sequence of a fixed-arity command and is
 * empty for variable-arity ones.
 */
export interface CommandDescriptor {
  readonly tokenKinds: ReadonlyArray<TokenKind>;
  readonly varArgs: boolean;
  readonly build: CommandConstructor;
}

/** The immutable name → descriptor table consulted by the parser. */
export type CommandRegistry = Readonly<Record<CommandName, CommandDescriptor>>;

// ---------------------------------------------------------------------------
// Parse results
// ---------------------------------------------------------------------------

/**
 * Result of one ConfigParser.parseNext() call.
 *
 * - a command, with `eof: false`
 * - end of input, with no command and no error
 * - an error; `eof` is true when input ended inside the failed command
 */
export type ParseResult =
  | { readonly ok: true; readonly command: ConfigCommand; readonly eof: false }
  | { readonly ok: true; readonly command: null; readonly eof: true }
  | { readonly ok: false; readonly error: ConfigError; readonly eof: boolean };
