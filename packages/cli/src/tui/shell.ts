/**
 * shell.ts — Keyline interactive command prompt.
 *
 * Each submitted line is parsed as command-language input with an empty
 * source label, so diagnostics carry no file/position prefix. Every parsed
 * command is echoed in canonical form; every error is printed and recorded
 * in the diagnostics log. Nothing is executed.
 *
 * The prompt is written directly to stdout rather than through rl.prompt(),
 * matching how command output is appended.
 */

import * as readline from 'node:readline'
import { loadConfig } from '@keyline/runtime-host'
import type { CliRuntime } from '../runtime.js'
import { renderCommandLine, renderErrorLine } from './output/command.js'
import { renderHelp } from './output/help.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'

/**
 * evaluateLine — parse one line of input and return the lines to print.
 */
export function evaluateLine(runtime: CliRuntime, input: string): string[] {
  const { commands, errors } = loadConfig({ source: '', text: input, logger: runtime.logger })
  return [
    ...commands.map(renderCommandLine),
    ...errors.map(renderErrorLine),
  ]
}

/**
 * launchShell — entry point for the interactive TTY prompt.
 *
 * Called from src/bin/keyline.ts when stdin and stdout are a TTY and
 * KEYLINE_NO_TUI is not set.
 */
export function launchShell(runtime: CliRuntime): Promise<void> {
  const ps1 = buildPS1('interactive')

  process.stdout.write(
    '\n  ' + t.blue.bold('K E Y L I N E') + '  ' + t.muted('command prompt') +
    '\n  ' + t.dim("type 'help' for the command language") + '\n'
  )

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 50,
  })
  rl.setPrompt(ps1)

  const showPrompt = (): void => {
    process.stdout.write('\n' + ps1)
  }

  showPrompt()

  rl.on('line', (line: string) => {
    const input = line.trim()

    if (input === '') {
      showPrompt()
      return
    }

    if (input === 'help') {
      renderHelp()
      showPrompt()
      return
    }

    for (const out of evaluateLine(runtime, input)) {
      process.stdout.write('\n' + out)
    }
    process.stdout.write('\n')
    showPrompt()
  })

  rl.on('SIGINT', () => {
    rl.close()
  })

  return new Promise(resolve => {
    rl.on('close', () => {
      process.stdout.write('\n')
      resolve()
    })
  })
}
