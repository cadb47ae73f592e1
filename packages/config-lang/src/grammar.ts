/**
 * Keyline Config Language — Grammar Registry
 *
 * Maps each command name to its grammar descriptor. The table is keyed by
 * the CommandName union, so adding a name without a descriptor (or the
 * reverse) fails to compile.
 *
 * The registry is frozen at module load and shared by reference between
 * parser instances. It is configuration data, not mutable state.
 */

import {
  buildAddView,
  buildMap,
  buildNewTab,
  buildQuit,
  buildRemoveTab,
  buildSet,
  buildSplitView,
  buildTheme,
  buildUnmap,
} from './commands.js';
import type { CommandConstructor, CommandDescriptor, CommandName, CommandRegistry } from './types.js';
import { TokenKind } from './types.js';

const { Word, Option } = TokenKind;

function fixed(tokenKinds: ReadonlyArray<TokenKind>, build: CommandConstructor): CommandDescriptor {
  return Object.freeze({ tokenKinds: Object.freeze([...tokenKinds]), varArgs: false, build });
}

function variadic(build: CommandConstructor): CommandDescriptor {
  return Object.freeze({ tokenKinds: Object.freeze([]), varArgs: true, build });
}

/** The default command grammar. */
export const COMMAND_REGISTRY: CommandRegistry = Object.freeze({
  set: fixed([Word, Word], buildSet),
  theme: fixed([Option, Word, Option, Word, Option, Word, Option, Word], buildTheme),
  map: fixed([Word, Word, Word], buildMap),
  unmap: fixed([Word, Word], buildUnmap),
  q: fixed([], buildQuit),
  addtab: fixed([Word], buildNewTab),
  rmtab: fixed([], buildRemoveTab),
  addview: variadic(buildAddView),
  vsplit: variadic(buildSplitView),
  hsplit: variadic(buildSplitView),
  split: variadic(buildSplitView),
});

/** All registered command names, in registry order. */
export const COMMAND_NAMES: ReadonlyArray<CommandName> = Object.freeze([
  'set',
  'theme',
  'map',
  'unmap',
  'q',
  'addtab',
  'rmtab',
  'addview',
  'vsplit',
  'hsplit',
  'split',
]);

/** True if `name` is a registered command name. Case-sensitive. */
export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((candidate) => candidate === name);
}

/**
 * Look up the descriptor for a command name.
 *
 * Returns undefined for unknown names. Names are matched case-sensitively.
 */
export function lookupCommand(
  name: string,
  registry: CommandRegistry = COMMAND_REGISTRY,
): CommandDescriptor | undefined {
  return isCommandName(name) ? registry[name] : undefined;
}
