/**
 * Map script parsing. One directive per line:
 *
 *   name key=value key="quoted value" bare-word
 *
 * Blank lines and lines starting with a comment marker are skipped.
 */

import type { ArgValue, Directive, ScriptIssue } from "../types.js";
import { COMMENT_MARKERS } from "../constants.js";
import { tokenizeLine, type Token } from "../utils/command.js";
import { MalformedArgumentError, errorMessage } from "../errors.js";
import { parseValue } from "./values.js";

export type ScriptLine = {
  line: number;
  text: string;
};

function stripBom(value: string): string {
  return value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
}

function isComment(trimmed: string): boolean {
  return COMMENT_MARKERS.some(marker => trimmed.startsWith(marker));
}

/**
 * Lines that carry a directive, with their 1-based line numbers.
 */
export function directiveLines(source: string): ScriptLine[] {
  const out: ScriptLine[] = [];
  const lines = stripBom(source).split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed === "" || isComment(trimmed)) continue;
    out.push({ line: i + 1, text: trimmed });
  }
  return out;
}

/**
 * Parse one directive line. Throws MalformedArgumentError on bad syntax.
 */
export function parseDirective(text: string, line: number): Directive {
  let tokens: Token[];
  try {
    tokens = tokenizeLine(text);
  } catch (err) {
    throw new MalformedArgumentError(errorMessage(err), { cause: err });
  }
  if (tokens.length === 0) {
    throw new MalformedArgumentError("Empty directive");
  }

  const [head, ...rest] = tokens;
  if (head.quoted || head.text.includes("=")) {
    throw new MalformedArgumentError(`Expected a directive name, got "${head.text}"`);
  }

  const args: Record<string, ArgValue> = {};
  const raw: Record<string, string> = {};
  const positional: string[] = [];

  for (const token of rest) {
    const eq = token.text.indexOf("=");
    // An "=" inside a quoted span is part of a bare value, not a separator
    if (eq < 0 || (token.quoted && token.quoteAt <= eq)) {
      positional.push(token.text);
      continue;
    }

    const key = token.text.slice(0, eq).trim();
    const value = token.text.slice(eq + 1);
    if (key === "") {
      throw new MalformedArgumentError(`Argument without a name: "${token.text}"`);
    }
    if (Object.hasOwn(args, key)) {
      throw new MalformedArgumentError(`Duplicate argument: ${key}`, { argument: key });
    }
    args[key] = parseValue(value, token.quoted);
    raw[key] = value;
  }

  return Object.freeze({
    name: head.text.toLowerCase(),
    args: Object.freeze(args),
    raw: Object.freeze(raw),
    positional: Object.freeze(positional),
    line,
    text
  });
}

/**
 * Parse a whole script eagerly. The first malformed line throws with its line number.
 */
export function parseScript(source: string): Directive[] {
  return directiveLines(source).map(({ line, text }, index) => {
    try {
      return parseDirective(text, line);
    } catch (err) {
      if (err instanceof MalformedArgumentError) {
        throw err.locate({ directiveIndex: index, line });
      }
      throw err;
    }
  });
}

/**
 * Parse every line and collect problems instead of stopping at the first one.
 */
export function collectParseIssues(source: string): { directives: Directive[]; issues: ScriptIssue[] } {
  const directives: Directive[] = [];
  const issues: ScriptIssue[] = [];

  for (const { line, text } of directiveLines(source)) {
    try {
      directives.push(parseDirective(text, line));
    } catch (err) {
      issues.push({
        line,
        kind: err instanceof MalformedArgumentError ? err.kind : "Unknown",
        message: errorMessage(err)
      });
    }
  }
  return { directives, issues };
}
