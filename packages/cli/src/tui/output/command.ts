import { formatCommand, renderConfigError } from '@keyline/config-lang'
import type { ConfigCommand, ConfigError, Token } from '@keyline/config-lang'
import { errorKindColor, t } from '../theme.js'

/** Plain, JSON-serialisable view of a token. */
export interface TokenJson {
  readonly kind: string
  readonly text: string
  readonly line: number
  readonly column: number
}

function tokenJson(token: Token): TokenJson {
  return {
    kind: token.kind,
    text: token.text,
    line: token.position.line,
    column: token.position.column,
  }
}

/**
 * commandToJson — a command with every token replaced by its text and position.
 */
export function commandToJson(command: ConfigCommand): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(command)) {
    const value: unknown = entry
    if (Array.isArray(value)) {
      out[key] = value.map((item: unknown) => isToken(item) ? tokenJson(item) : item)
    } else {
      out[key] = isToken(value) ? tokenJson(value) : value
    }
  }
  return out
}

function isToken(value: unknown): value is Token {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    'text' in value &&
    'position' in value
  )
}

/** One colored line for a parsed command. */
export function renderCommandLine(command: ConfigCommand): string {
  return '  ' + t.green('✓ ') + t.white(formatCommand(command))
}

/** One colored line for a parse error. */
export function renderErrorLine(error: ConfigError): string {
  return '  ' + errorKindColor(error.kind)('✗ ' + renderConfigError(error))
}
