/**
 * Key Name Resolution
 *
 * Turns the free-form key names typed into a macro ("Space", " esc ",
 * "F5", "a") into a closed key identifier:
 *
 *   special   a named key from the fixed table below
 *   function  F1..Fn
 *   char      anything else, passed through literally
 *
 * Resolution is total: every string resolves, there is no error path.
 * Note the literal fallback means a typo such as "spcae" resolves to a
 * multi-character literal rather than failing.
 */

export const SPECIAL_KEYS = [
  'space',
  'enter',
  'tab',
  'escape',
  'shift',
  'control',
  'alt',
  'command',
  'up',
  'down',
  'left',
  'right',
  'backspace',
  'delete',
] as const;

export type SpecialKey = typeof SPECIAL_KEYS[number];

export type KeyId =
  | { kind: 'special'; name: SpecialKey }
  | { kind: 'function'; number: number }
  | { kind: 'char'; char: string };

const SPECIAL_ALIASES: ReadonlyMap<string, SpecialKey> = new Map<string, SpecialKey>([
  ['space', 'space'],
  ['enter', 'enter'],
  ['tab', 'tab'],
  ['esc', 'escape'],
  ['escape', 'escape'],
  ['shift', 'shift'],
  ['ctrl', 'control'],
  ['control', 'control'],
  ['alt', 'alt'],
  ['cmd', 'command'],
  ['command', 'command'],
  ['win', 'command'],
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['backspace', 'backspace'],
  ['delete', 'delete'],
]);

const FUNCTION_KEY = /^f(\d+)$/;

export function resolveKey(name: string): KeyId {
  const k = name.trim().toLowerCase();

  const special = SPECIAL_ALIASES.get(k);
  if (special !== undefined) {
    return { kind: 'special', name: special };
  }

  const fn = FUNCTION_KEY.exec(k);
  if (fn) {
    return { kind: 'function', number: parseInt(fn[1], 10) };
  }

  return { kind: 'char', char: k };
}

/** Stable string form, used on the wire and in status messages */
export function formatKeyId(key: KeyId): string {
  switch (key.kind) {
    case 'special':
      return key.name;
    case 'function':
      return `f${key.number}`;
    case 'char':
      return key.char;
  }
}

export function sameKey(a: KeyId, b: KeyId): boolean {
  return a.kind === b.kind && formatKeyId(a) === formatKeyId(b);
}
