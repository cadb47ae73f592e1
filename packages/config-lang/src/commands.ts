/**
 * Keyline Config Language — Command Constructors
 *
 * One constructor per command shape. Constructors receive tokens the grammar
 * has already matched, so fixed-arity constructors only assign positionally.
 * Theme, add-view and split-view apply command-specific rules and may fail.
 */

import { quote } from './errors.js';
import type {
  BuildResult,
  CommandConstructor,
  ConfigCommand,
  ErrorFactory,
  Token,
} from './types.js';
import { ContainerOrientation } from './types.js';

function built(command: ConfigCommand): BuildResult {
  return { ok: true, command: Object.freeze(command) };
}

/**
 * Only reachable if a descriptor's token kinds and its constructor disagree.
 */
function arityMismatch(commandToken: Token, fail: ErrorFactory): BuildResult {
  return {
    ok: false,
    error: fail(commandToken, 'internal', `Missing arguments for command ${quote(commandToken.text)}`),
  };
}

function usage(commandToken: Token, fail: ErrorFactory): BuildResult {
  const name = commandToken.text;
  return {
    ok: false,
    error: fail(commandToken, 'usage', `Invalid ${name} command. Usage: ${name} [VIEW] [ARGS...]`),
  };
}

// ---------------------------------------------------------------------------
// Fixed-arity commands
// ---------------------------------------------------------------------------

export const buildSet: CommandConstructor = (commandToken, tokens, fail) => {
  const [variable, value] = tokens;
  if (variable === undefined || value === undefined) {
    return arityMismatch(commandToken, fail);
  }
  return built({ type: 'set', variable, value });
};

export const buildMap: CommandConstructor = (commandToken, tokens, fail) => {
  const [view, from, to] = tokens;
  if (view === undefined || from === undefined || to === undefined) {
    return arityMismatch(commandToken, fail);
  }
  return built({ type: 'map', view, from, to });
};

export const buildUnmap: CommandConstructor = (commandToken, tokens, fail) => {
  const [view, from] = tokens;
  if (view === undefined || from === undefined) {
    return arityMismatch(commandToken, fail);
  }
  return built({ type: 'unmap', view, from });
};

export const buildQuit: CommandConstructor = () => built({ type: 'quit' });

export const buildNewTab: CommandConstructor = (commandToken, tokens, fail) => {
  const [tabName] = tokens;
  if (tabName === undefined) {
    return arityMismatch(commandToken, fail);
  }
  return built({ type: 'newTab', tabName });
};

export const buildRemoveTab: CommandConstructor = () => built({ type: 'removeTab' });

// ---------------------------------------------------------------------------
// theme
// ---------------------------------------------------------------------------

type ThemeField = 'name' | 'component' | 'bgcolor' | 'fgcolor';

const THEME_OPTIONS: ReadonlyMap<string, ThemeField> = new Map<string, ThemeField>([
  ['--name', 'name'],
  ['--component', 'component'],
  ['--bgcolor', 'bgcolor'],
  ['--fgcolor', 'fgcolor'],
]);

/**
 * Walks (option, value) pairs. A repeated switch overwrites the earlier
 * value; a switch that is never supplied leaves its field unset.
 */
export const buildTheme: CommandConstructor = (_commandToken, tokens, fail) => {
  const fields: Partial<Record<ThemeField, Token>> = {};

  for (let i = 0; i + 1 < tokens.length; i += 2) {
    const optionToken = tokens[i];
    const valueToken = tokens[i + 1];
    if (optionToken === undefined || valueToken === undefined) break;

    const field = THEME_OPTIONS.get(optionToken.text);
    if (field === undefined) {
      return {
        ok: false,
        error: fail(optionToken, 'usage', `Invalid option for theme command: ${quote(optionToken.text)}`),
      };
    }

    fields[field] = valueToken;
  }

  return built({ type: 'theme', ...fields });
};

// ---------------------------------------------------------------------------
// Variable-arity commands
// ---------------------------------------------------------------------------

export const buildAddView: CommandConstructor = (commandToken, tokens, fail) => {
  const [view, ...args] = tokens;
  if (view === undefined) {
    return usage(commandToken, fail);
  }
  return built({ type: 'addView', view, args: Object.freeze(args) });
};

const SPLIT_ORIENTATIONS: ReadonlyMap<string, ContainerOrientation> = new Map([
  ['split', ContainerOrientation.Dynamic],
  ['hsplit', ContainerOrientation.Horizontal],
  ['vsplit', ContainerOrientation.Vertical],
]);

/** Shared by split, hsplit and vsplit; the orientation comes from the name. */
export const buildSplitView: CommandConstructor = (commandToken, tokens, fail) => {
  const [view, ...args] = tokens;
  if (view === undefined) {
    return usage(commandToken, fail);
  }

  const orientation = SPLIT_ORIENTATIONS.get(commandToken.text);
  if (orientation === undefined) {
    return {
      ok: false,
      error: fail(commandToken, 'internal', `Unrecognised command: ${commandToken.text}`),
    };
  }

  return built({ type: 'splitView', orientation, view, args: Object.freeze(args) });
};
