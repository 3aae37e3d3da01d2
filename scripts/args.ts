/**
 * Flag parsing shared by the maintenance scripts. Both helpers remove what
 * they consume, so the remaining args are the positionals.
 */

import { InvalidInputError } from '../src/errors.js';

export function readFlag(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i === -1) return undefined;
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new InvalidInputError(`${name} requires a value`);
  }
  args.splice(i, 2);
  return value;
}

export function readSwitch(args: string[], name: string): boolean {
  const i = args.indexOf(name);
  if (i === -1) return false;
  args.splice(i, 1);
  return true;
}
