// ── Axis Array Parser ──

// Leading number as C strtod() reads it (decimal form)
const NUMBER_PREFIX =
  /^\s*[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)/i;

interface LeadingNumber {
  value: number;
  rest: string;
}

export function readLeadingNumber(input: string): LeadingNumber | null {
  const match = NUMBER_PREFIX.exec(input);
  if (!match) return null;

  const text = match[0].trim();
  const unsigned = text.replace(/^[+-]/, "").toLowerCase();
  const negative = text.startsWith("-");
  let value: number;
  if (unsigned.startsWith("inf")) {
    value = negative ? -Infinity : Infinity;
  } else if (unsigned === "nan") {
    value = NaN;
  } else {
    value = Number(text);
  }
  return { value, rest: input.slice(match[0].length) };
}

/**
 * Parse a delimiter separated list of numbers into `target`, left to right.
 *
 * Slots past the last parsed value keep whatever they held, so callers seed
 * `target` with defaults first. Returns the number of values written: 0 when
 * the first token is not a number, otherwise the count up to the first
 * malformed token, the end of input, or `target.length`.
 */
export function parseAxisArray(input: string, target: number[]): number {
  let remaining = input;
  for (let i = 0; i < target.length; i++) {
    const parsed = readLeadingNumber(remaining);
    if (!parsed) return i;
    target[i] = parsed.value;
    if (parsed.rest === "") return i + 1;
    // Any single character separates values
    remaining = parsed.rest.slice(1);
  }
  return target.length;
}

export function parseAxisOverride(
  input: string,
  current: readonly number[]
): { count: number; values: number[] } {
  const values = [...current];
  const count = parseAxisArray(input, values);
  return { count, values };
}
