/**
 * Keyline Config Language — Error Generation
 *
 * Every error the parser reports is created here and rendered here, so all
 * diagnostics share one shape:
 *
 *   <source>:<line>:<column> <message>[: <lexical error>]
 *
 * The `<source>:<line>:<column> ` prefix is omitted when the parser has no
 * source label (interactive input).
 */

import type { ConfigError, ConfigErrorKind, Token } from './types.js';

/**
 * Create an error attributed to `token`.
 *
 * The token's embedded lexical error, if any, is carried along and appended
 * when the error is rendered.
 */
export function generateConfigError(
  source: string,
  token: Token,
  kind: ConfigErrorKind,
  message: string,
): ConfigError {
  return Object.freeze({
    kind,
    source,
    position: token.position,
    message,
    lexError: token.lexError,
  });
}

/**
 * Wrap a token source failure. Scanner failures carry no position and render
 * as the underlying message alone.
 */
export function scannerError(source: string, cause: Error): ConfigError {
  return Object.freeze({
    kind: 'scanner',
    source,
    message: cause.message,
  });
}

/** Render an error as a single diagnostic line. */
export function renderConfigError(error: ConfigError): string {
  let rendered = '';

  if (error.source !== '' && error.position !== undefined) {
    rendered += `${error.source}:${error.position.line}:${error.position.column} `;
  }

  rendered += error.message;

  if (error.lexError !== undefined) {
    rendered += `: ${error.lexError}`;
  }

  return rendered;
}

/** Quote token text for inclusion in a message, escaping control characters. */
export function quote(text: string): string {
  return JSON.stringify(text);
}
