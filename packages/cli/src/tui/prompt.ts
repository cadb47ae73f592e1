import { t } from './theme.js'

/**
 * buildPS1 — construct the colored prompt string.
 *
 * Format: [keyline:<label>] ❯
 */
export function buildPS1(label: string): string {
  const bracket = t.blueDim

  return (
    bracket('[') +
    t.blue.bold('keyline') +
    bracket(':') +
    t.muted(label) +
    bracket(']') +
    bracket(' ❯ ')
  )
}
