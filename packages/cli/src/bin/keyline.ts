#!/usr/bin/env node
/**
 * bin/keyline.ts — TTY-aware entry point for the `keyline` CLI command.
 *
 * With no arguments, in a TTY, with KEYLINE_NO_TUI unset: launches the
 * interactive prompt. Otherwise: delegates to Commander.
 *
 * KEYLINE_NO_TUI=1 keyline   → Commander help
 * keyline (in TTY)           → interactive prompt
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.argv.length <= 2 && process.env['KEYLINE_NO_TUI'] === undefined

if (isInteractive) {
  const { launchShell } = await import('../tui/shell.js')
  const { buildRuntime } = await import('../runtime.js')
  await launchShell(buildRuntime())
} else {
  const { program } = await import('../commands/index.js')
  program.parse()
}
