/**
 * Keyline Config Language — Command Formatting
 *
 * Renders a ConfigCommand back to a single line of command-language text.
 * The output scans and parses to a command with the same token texts.
 *
 * The theme grammar takes exactly four option/value pairs. A theme with
 * fewer fields set (a switch was repeated) is padded by repeating its first
 * switch, which reads back to the same fields.
 */

import type { ConfigCommand, ThemeCommand, Token } from './types.js';
import { ContainerOrientation, TokenKind } from './types.js';

const SPLIT_NAMES: Readonly<Record<ContainerOrientation, string>> = {
  [ContainerOrientation.Dynamic]: 'split',
  [ContainerOrientation.Horizontal]: 'hsplit',
  [ContainerOrientation.Vertical]: 'vsplit',
};

const PLAIN_WORD = /^[^\s;"\\]+$/;

function escapeQuoted(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
}

/**
 * Render one token so the scanner reads back the same kind and text.
 * Words that would otherwise scan as options or comments are quoted.
 */
export function formatToken(token: Token): string {
  const plain = PLAIN_WORD.test(token.text);
  if (token.kind === TokenKind.Option && plain) {
    return token.text;
  }
  if (plain && !token.text.startsWith('--') && !token.text.startsWith('#')) {
    return token.text;
  }
  return `"${escapeQuoted(token.text)}"`;
}

const THEME_PAIRS = 4;

function formatTheme(command: ThemeCommand): string {
  const switches: string[] = [];
  if (command.name !== undefined) switches.push(`--name ${formatToken(command.name)}`);
  if (command.component !== undefined) switches.push(`--component ${formatToken(command.component)}`);
  if (command.bgcolor !== undefined) switches.push(`--bgcolor ${formatToken(command.bgcolor)}`);
  if (command.fgcolor !== undefined) switches.push(`--fgcolor ${formatToken(command.fgcolor)}`);

  const [first] = switches;
  if (first === undefined) {
    return 'theme';
  }
  const padding: string[] = Array.from({ length: THEME_PAIRS - switches.length }, () => first);
  return ['theme', first, ...padding, ...switches.slice(1)].join(' ');
}

function line(name: string, tokens: ReadonlyArray<Token>): string {
  return [name, ...tokens.map(formatToken)].join(' ');
}

/** Render a command as one line of command-language text. */
export function formatCommand(command: ConfigCommand): string {
  switch (command.type) {
    case 'set':
      return line('set', [command.variable, command.value]);
    case 'theme':
      return formatTheme(command);
    case 'map':
      return line('map', [command.view, command.from, command.to]);
    case 'unmap':
      return line('unmap', [command.view, command.from]);
    case 'quit':
      return 'q';
    case 'newTab':
      return line('addtab', [command.tabName]);
    case 'removeTab':
      return 'rmtab';
    case 'addView':
      return line('addview', [command.view, ...command.args]);
    case 'splitView':
      return line(SPLIT_NAMES[command.orientation], [command.view, ...command.args]);
  }
}
