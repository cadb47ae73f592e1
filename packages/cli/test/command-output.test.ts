/**
 * CLI command output tests.
 *
 * Exercises the JSON view used by `keyline parse --json` and the line
 * evaluation used by the interactive prompt. The diagnostic logger has no
 * sink, so nothing is written to disk.
 */

import { describe, it, expect } from 'vitest'
import { ConfigParser, ConfigScanner, DiagnosticLogger, formatCommand } from '@keyline/config-lang'
import type { ConfigCommand } from '@keyline/config-lang'
import { FileLogIO } from '@keyline/runtime-host'
import { commandToJson } from '../src/tui/output/command.js'
import { evaluateLine } from '../src/tui/shell.js'
import type { CliRuntime } from '../src/runtime.js'

function parseOne(text: string): ConfigCommand {
  const result = new ConfigParser(new ConfigScanner(text), 'test.rc').parseNext()
  if (!result.ok || result.command === null) {
    throw new Error(`expected a command from ${JSON.stringify(text)}`)
  }
  return result.command
}

// Strip ANSI colour codes so assertions do not depend on terminal support.
function plain(line: string): string {
  return line.replace(/\u001b\[[0-9;]*m/g, '')
}

const runtime: CliRuntime = {
  home:   '/tmp/keyline-test-home',
  logIO:  new FileLogIO('/tmp/keyline-test-home'),
  logger: new DiagnosticLogger(),
}

describe('commandToJson', () => {
  it('replaces tokens with text and position', () => {
    expect(commandToJson(parseOne('map tree j down\n'))).toEqual({
      type: 'map',
      view: { kind: 'word', text: 'tree', line: 1, column: 5 },
      from: { kind: 'word', text: 'j',    line: 1, column: 10 },
      to:   { kind: 'word', text: 'down', line: 1, column: 12 },
    })
  })

  it('maps every argument of a variable-arity command', () => {
    expect(commandToJson(parseOne('addview log -n 5'))).toEqual({
      type: 'addView',
      view: { kind: 'word', text: 'log', line: 1, column: 9 },
      args: [
        { kind: 'word', text: '-n', line: 1, column: 13 },
        { kind: 'word', text: '5',  line: 1, column: 16 },
      ],
    })
  })

  it('keeps a command without tokens as its type', () => {
    expect(commandToJson(parseOne('q'))).toEqual({ type: 'quit' })
  })
})

describe('formatCommand round trip', () => {
  it('re-parses formatted output to the same token texts', () => {
    const original = parseOne('set prompt "a b;c"\n')
    const again = parseOne(formatCommand(original))

    expect(formatCommand(again)).toBe('set prompt "a b;c"')
    expect(commandToJson(again)['type']).toBe('set')
  })
})

describe('evaluateLine', () => {
  it('echoes each parsed command in canonical form', () => {
    expect(evaluateLine(runtime, 'addtab main; q').map(plain)).toEqual([
      '  ✓ addtab main',
      '  ✓ q',
    ])
  })

  it('lists errors after commands without a source prefix', () => {
    expect(evaluateLine(runtime, 'bogus; rmtab').map(plain)).toEqual([
      '  ✓ rmtab',
      '  ✗ Invalid command "bogus"',
    ])
  })
})
