const UNCH_PATTERN = /^unch(?:anged)?\.?$/i;
const NUMBER_PATTERN = /^-?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

export function isUnchangedToken(input: string): boolean {
  return UNCH_PATTERN.test(input.trim());
}

function toFloat(token: string): number | null {
  if (!NUMBER_PATTERN.test(token)) {
    return null;
  }
  const parsed = Number(token);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parses a quote cell such as `6,012.45`, `+15.20` or `1,234s`.
 * Unch tokens read as 0; anything else that is not a number yields null.
 */
export function parseQuoteNumber(input: string): number | null {
  const cleaned = input
    .trim()
    .replace(/,/g, '')
    .replace(/s+$/, '')
    .replace(/^\++|\++$/g, '')
    .trim();

  if (isUnchangedToken(cleaned)) {
    return 0;
  }
  return toFloat(cleaned);
}

/**
 * Parses a percent-change cell into a fraction. Values whose magnitude is above 1
 * are read as whole percentages and divided by 100 until they are not.
 */
export function parsePercentFraction(input: string): number | null {
  const cleaned = input.trim().replace(/[%,+]/g, '').trim();
  const unchanged = isUnchangedToken(cleaned);

  let value = unchanged ? 0 : toFloat(cleaned);
  if (value === null) {
    return null;
  }

  while (Math.abs(value) > 1) {
    value /= 100;
  }

  return unchanged ? 0 : value;
}
