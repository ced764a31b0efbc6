/**
 * Shared OSC argument parsing utilities.
 *
 * OSC args arrive in two forms:
 *   - Raw values: number, string
 *   - Typed objects: { type: 'f'|'i'|'s', value: any }
 *
 * These helpers normalize both forms consistently for every listener.
 */

export interface TypedOscArg {
  type: string;
  value: unknown;
}

function isTypedArg(arg: unknown): arg is TypedOscArg {
  return typeof arg === 'object' && arg !== null && 'type' in arg && 'value' in arg;
}

function rawValue(args: readonly unknown[], index: number): unknown {
  if (args.length <= index) return undefined;
  const arg = args[index];
  return isTypedArg(arg) ? arg.value : arg;
}

/** Extract a float from args[0] (or args[index]) */
export function getFloat(args: readonly unknown[], index = 0): number {
  const val = rawValue(args, index);
  if (typeof val === 'number') return val;
  if (typeof val === 'boolean') return val ? 1 : 0;
  if (typeof val === 'string') return parseFloat(val) || 0;
  return 0;
}

/** Extract a string from args[0] (or args[index]) */
export function getString(args: readonly unknown[], index = 0): string {
  const val = rawValue(args, index);
  return val === undefined ? '' : String(val);
}

/**
 * Extract a boolean from args[0].
 * Booleans are taken as-is, numbers count as pressed above 0.5, and a missing arg means pressed.
 */
export function getBool(args: readonly unknown[], index = 0): boolean {
  const val = rawValue(args, index);
  if (val === undefined) return true;
  if (typeof val === 'boolean') return val;
  return getFloat(args, index) > 0.5;
}

/** All args as strings */
export function getStrings(args: readonly unknown[]): string[] {
  return args.map((_, i) => getString(args, i));
}

/** Wrap a string as a typed OSC arg */
export function stringArg(value: string): TypedOscArg {
  return { type: 's', value };
}
