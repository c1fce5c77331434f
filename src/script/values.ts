import type { ArgValue, Percentage } from "../types.js";

const NUMBER_RE = /^-?\d+(?:\.\d+)?$/;
const PERCENT_RE = /^(-?\d+(?:\.\d+)?)%$/;

export function percent(value: number): Percentage {
  return { kind: "percent", value };
}

export function isPercentage(value: unknown): value is Percentage {
  return (
    typeof value === "object" && value !== null &&
    "kind" in value && value.kind === "percent" &&
    "value" in value && typeof value.value === "number"
  );
}

/**
 * Type an argument literal. Quoted text always stays a string.
 */
export function parseValue(text: string, quoted: boolean): ArgValue {
  if (quoted) return text;

  const lower = text.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  if (NUMBER_RE.test(text)) return Number(text);

  const pct = PERCENT_RE.exec(text);
  if (pct) return percent(Number(pct[1]));

  return text;
}

/**
 * Render a value the way it would be written in a script.
 */
export function formatValue(value: ArgValue): string | number | boolean {
  return isPercentage(value) ? `${value.value}%` : value;
}
