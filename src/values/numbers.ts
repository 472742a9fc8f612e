/**
 * Numeric tokens as they appear in Italian documents: optional currency,
 * sign and parentheses, `.`/space thousands groups, `,` decimals, trailing `%`.
 */
export const NUMBER_TOKEN_PATTERN =
  /(?:[€$£]\s?)?[-+]?\(?\d{1,3}(?:[.\u00a0 ]\d{3})+(?:,\d+)?\)?\s?[%€]?|(?:[€$£]\s?)?[-+]?\(?\d+(?:,\d+)?\)?\s?[%€]?/g;

/**
 * `"1.234,56"` → 1234.56, `"(1.234,56)"` → -1234.56, `"12,5%"` → 0.125.
 * Returns null for anything that does not normalize to a plain number.
 */
export function normalizeItalianNumber(token: string): number | null {
  let text = token.replace(/[\s€$£]/g, "");

  const isPercentage = text.endsWith("%");
  if (isPercentage) {
    text = text.slice(0, -1);
  }

  let isNegative = false;
  if (text.startsWith("(") && text.endsWith(")")) {
    isNegative = true;
    text = text.slice(1, -1);
  }

  if (text.startsWith("-") || text.startsWith("+")) {
    if (text.startsWith("-")) {
      isNegative = true;
    }
    text = text.slice(1);
  }

  text = text.replace(/(?<=\d)\.(?=\d)/g, "").replace(",", ".");
  if (!/^\d+(?:\.\d+)?$/.test(text)) {
    return null;
  }

  let value = Number.parseFloat(text);
  if (isNegative) {
    value = -value;
  }
  if (isPercentage) {
    value = value / 100;
  }
  return value;
}
