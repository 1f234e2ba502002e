/**
 * Key decoding and keybindings
 *
 * Raw terminal input arrives as byte chunks that may hold several keys.
 * decodeKeys() turns a chunk into key names ("q", "5", "up", "shift+tab");
 * the bindings below map names to dashboard commands. An escape sequence can
 * be split across chunks, so decodeKeyStream() holds back an unfinished one
 * for the caller to join with the next chunk.
 */

export type DashboardCommand =
  | 'quit'
  | 'next-screen'
  | 'previous-screen'
  | 'move-up'
  | 'move-down'
  | 'decrease'
  | 'increase'
  | 'activate';

const COMMAND_BY_KEY: Readonly<Record<string, DashboardCommand>> = Object.freeze({
  q: 'quit',
  escape: 'quit',
  'ctrl+c': 'quit',
  tab: 'next-screen',
  'shift+tab': 'previous-screen',
  up: 'move-up',
  down: 'move-down',
  left: 'decrease',
  right: 'increase',
  enter: 'activate',
});

const SEQUENCE_NAMES: Readonly<Record<string, string>> = Object.freeze({
  '\x1b[A': 'up',
  '\x1b[B': 'down',
  '\x1b[C': 'right',
  '\x1b[D': 'left',
  '\x1bOA': 'up',
  '\x1bOB': 'down',
  '\x1bOC': 'right',
  '\x1bOD': 'left',
  '\x1b[Z': 'shift+tab',
});

const CHARACTER_NAMES: Readonly<Record<string, string>> = Object.freeze({
  '\r': 'enter',
  '\n': 'enter',
  '\t': 'tab',
  '\x03': 'ctrl+c',
  '\x1b': 'escape',
  '\x7f': 'backspace',
});

const ESCAPE_SEQUENCE = /^\x1b(?:\[[0-9;]*[A-Za-z~]|O[A-Za-z])/;

/** A trailing escape sequence that is not finished yet */
const ESCAPE_PREFIX = /\x1b(?:\[[0-9;]*|O)?$/;

export interface DecodedKeys {
  keys: string[];
  /** Unfinished escape sequence at the end of the input, '' when none */
  partial: string;
}

function decodeComplete(text: string): string[] {
  const keys: string[] = [];
  let rest = text;

  while (rest.length > 0) {
    const sequence = ESCAPE_SEQUENCE.exec(rest)?.[0];
    if (sequence !== undefined) {
      keys.push(SEQUENCE_NAMES[sequence] ?? sequence);
      rest = rest.slice(sequence.length);
      continue;
    }

    const [character = ''] = rest;
    keys.push(CHARACTER_NAMES[character] ?? character);
    rest = rest.slice(character.length);
  }

  return keys;
}

/** Decodes a whole chunk; a trailing unfinished sequence decodes as its characters */
export function decodeKeys(chunk: Buffer | string): string[] {
  return decodeComplete(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
}

export function decodeKeyStream(text: string): DecodedKeys {
  const match = ESCAPE_PREFIX.exec(text);
  if (match === null) {
    return { keys: decodeComplete(text), partial: '' };
  }
  return { keys: decodeComplete(text.slice(0, match.index)), partial: match[0] };
}

export function resolveDashboardCommand(key: string): DashboardCommand | undefined {
  return COMMAND_BY_KEY[key.toLowerCase()];
}

/** The digit of a screen shortcut key, or null */
export function screenShortcut(key: string): number | null {
  return /^[0-9]$/.test(key) ? Number(key) : null;
}
