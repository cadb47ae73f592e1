/**
 * @keyline/config-lang
 *
 * Keyline's command language: tokens, scanner, grammar registry, parser and
 * structured diagnostics.
 *
 * This package is the base layer of Keyline. It defines:
 * - The token model and the ConfigScanner token source
 * - The nine ConfigCommand variants
 * - The frozen grammar registry and its command constructors
 * - ConfigParser, the recovering parser driver
 * - ConfigError and its single rendering path
 * - formatCommand(), rendering commands back to command-language text
 * - The DiagnosticSink contract and DiagnosticLogger
 *
 * It performs no I/O.
 */

// Types
export type {
  AddViewCommand,
  BuildResult,
  CommandConstructor,
  CommandDescriptor,
  CommandName,
  CommandRegistry,
  ConfigCommand,
  ConfigError,
  ConfigErrorKind,
  ErrorFactory,
  MapCommand,
  NewTabCommand,
  ParseResult,
  QuitCommand,
  RemoveTabCommand,
  ScanResult,
  SetCommand,
  SplitViewCommand,
  ThemeCommand,
  Token,
  TokenPosition,
  TokenSource,
  UnmapCommand,
} from './types.js';

export { ContainerOrientation, TokenKind, tokenKindName } from './types.js';

// Scanner
export { ConfigScanner, ScannerClosedError } from './scanner.js';

// Grammar
export { COMMAND_NAMES, COMMAND_REGISTRY, isCommandName, lookupCommand } from './grammar.js';

// Parser
export type { ConfigParserOptions } from './parser.js';
export { ConfigParser } from './parser.js';

// Formatting
export { formatCommand, formatToken } from './format.js';

// Errors
export { generateConfigError, renderConfigError, scannerError } from './errors.js';

// Logging
export type { DiagnosticEntry, DiagnosticSink } from './logging/diagnostic-sink.js';
export { DiagnosticLogger } from './logging/diagnostic-log.js';
