/**
 * Argument readers for directive handlers. Each reader throws
 * MalformedArgumentError naming the directive and argument.
 */

import type { ArgValue, Directive } from "../types.js";
import { MalformedArgumentError } from "../errors.js";
import { parseValue } from "../script/values.js";

type Lookup = {
  positional?: number; // Index of the bare token to fall back on
};

function missing(d: Directive, key: string): MalformedArgumentError {
  return new MalformedArgumentError(`${d.name} requires ${key}`, { argument: key });
}

/**
 * Raw text of an argument, from key=value or from a bare token.
 */
function lookupText(d: Directive, key: string, opts: Lookup): string | undefined {
  if (Object.hasOwn(d.raw, key)) return d.raw[key];
  if (opts.positional !== undefined) return d.positional[opts.positional];
  return undefined;
}

export function optionalStringArg(d: Directive, key: string, opts: Lookup = {}): string | undefined {
  return lookupText(d, key, opts);
}

export function stringArg(d: Directive, key: string, opts: Lookup = {}): string {
  const text = lookupText(d, key, opts);
  if (text === undefined || text.trim() === "") throw missing(d, key);
  return text;
}

export function optionalNumberArg(
  d: Directive,
  key: string,
  opts: Lookup & { min?: number; integer?: boolean } = {}
): number | undefined {
  const text = lookupText(d, key, opts);
  if (text === undefined) return undefined;

  const value = Object.hasOwn(d.args, key) ? d.args[key] : parseValue(text, false);
  const kind = opts.integer ? "an integer" : "a number";
  if (typeof value !== "number" || (opts.integer && !Number.isInteger(value))) {
    throw new MalformedArgumentError(`${d.name} ${key} must be ${kind}, got "${text}"`, { argument: key });
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new MalformedArgumentError(`${d.name} ${key} must be >= ${opts.min}, got ${value}`, { argument: key });
  }
  return value;
}

export function numberArg(d: Directive, key: string, opts: Lookup & { min?: number; integer?: boolean } = {}): number {
  const value = optionalNumberArg(d, key, opts);
  if (value === undefined) throw missing(d, key);
  return value;
}

/**
 * Typed value of a named argument.
 */
export function valueArg(d: Directive, key: string): ArgValue {
  if (!Object.hasOwn(d.args, key)) throw missing(d, key);
  return d.args[key];
}

/**
 * Reject named arguments outside the accepted set and surplus bare tokens.
 */
export function expectArgs(d: Directive, names: readonly string[], maxPositional: number): void {
  for (const key of Object.keys(d.args)) {
    if (!names.includes(key)) {
      throw new MalformedArgumentError(`${d.name} does not take argument ${key}`, { argument: key });
    }
  }
  if (maxPositional >= 0 && d.positional.length > maxPositional) {
    throw new MalformedArgumentError(
      `${d.name} takes at most ${maxPositional} bare argument(s), got ${d.positional.length}`
    );
  }
}
