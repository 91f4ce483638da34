/**
 * Shared CLI argument helpers.
 */

/**
 * Value following `--name`, or undefined when the flag is absent.
 * Throws when the flag is present without a value.
 */
export function getFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${name} requires a value`);
  }
  return value;
}

/**
 * Numeric flag value. Throws when the value is not a finite number.
 */
export function getNumberFlag(args: string[], name: string): number | undefined {
  const value = getFlag(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got '${value}'`);
  }
  return parsed;
}

/**
 * Positional arguments, skipping flags and the values of `valueFlags`.
 */
export function getPositionals(args: string[], valueFlags: readonly string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('--')) positionals.push(arg);
  }
  return positionals;
}
