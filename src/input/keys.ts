/**
 * Key Combo Parser
 *
 * Parses strings such as "ctrl+alt+shift+a", "enter" or "command+F12" into
 * an ordered modifier list plus one main key. Matching is case-insensitive;
 * a single-character main key keeps its case.
 */

import type { Key, KeyCombo, ModifierKey, NamedKey } from './types.js';

const MODIFIER_ENTRIES: [string, ModifierKey][] = [
  ['ctrl', 'Control'],
  ['control', 'Control'],
  ['alt', 'Alt'],
  ['shift', 'Shift'],
  ['super', 'Meta'],
  ['win', 'Meta'],
  ['windows', 'Meta'],
  ['command', 'Meta'],
];

// Maps, so names inherited from Object.prototype never resolve
const MODIFIERS = new Map<string, ModifierKey>(MODIFIER_ENTRIES);

const NAMED_KEYS = new Map<string, NamedKey>([
  // Special keys
  ['esc', 'Escape'],
  ['escape', 'Escape'],
  ['return', 'Return'],
  ['enter', 'Return'],
  ['tab', 'Tab'],
  ['space', 'Space'],
  ['backspace', 'Backspace'],
  ['up', 'UpArrow'],
  ['down', 'DownArrow'],
  ['left', 'LeftArrow'],
  ['right', 'RightArrow'],
  ['delete', 'Delete'],
  ['insert', 'Insert'],
  ['home', 'Home'],
  ['end', 'End'],
  ['pageup', 'PageUp'],
  ['pagedown', 'PageDown'],
  ['printscreen', 'PrintScreen'],
  ['pause', 'Pause'],
  ['numlock', 'NumLock'],
  ['capslock', 'CapsLock'],

  // Modifiers may also be the main key ("shift" on its own)
  ...MODIFIER_ENTRIES,

  // Function keys
  ['f1', 'F1'],
  ['f2', 'F2'],
  ['f3', 'F3'],
  ['f4', 'F4'],
  ['f5', 'F5'],
  ['f6', 'F6'],
  ['f7', 'F7'],
  ['f8', 'F8'],
  ['f9', 'F9'],
  ['f10', 'F10'],
  ['f11', 'F11'],
  ['f12', 'F12'],
]);

const NUMPAD_KEY = /^kp_([0-9])$/;

export class KeyParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyParseError';
  }
}

/**
 * Resolve the final token of a combo.
 */
export function parseSingleKey(token: string): Key {
  const lower = token.toLowerCase();

  const named = NAMED_KEYS.get(lower);
  if (named !== undefined) {
    return { kind: 'named', name: named };
  }

  // Numpad digits are injected as the plain digit characters
  const numpad = NUMPAD_KEY.exec(lower);
  if (numpad) {
    return { kind: 'char', char: numpad[1] };
  }

  // Exactly one code point, so "é" and "😊" are valid keys
  if ([...token].length === 1) {
    return { kind: 'char', char: token };
  }

  throw new KeyParseError(token === '' ? 'Missing key' : `Invalid key: ${token}`);
}

export function parseKeyCombo(input: string): KeyCombo {
  const parts = input.split('+');
  const keyToken = parts[parts.length - 1];

  const modifiers = parts.slice(0, -1).map((part) => {
    const modifier = MODIFIERS.get(part.toLowerCase());
    if (modifier === undefined) {
      throw new KeyParseError(`Unknown modifier: ${part}`);
    }
    return modifier;
  });

  return { modifiers, key: parseSingleKey(keyToken) };
}

/**
 * Readable form of a key, used in logs and the mock device's operation log.
 */
export function describeKey(key: Key): string {
  return key.kind === 'named' ? key.name : key.char;
}
