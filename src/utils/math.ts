/**
 * Money arithmetic helpers. Balances are plain dollars as numbers.
 */

/**
 * Rounds a dollar amount to whole cents.
 *
 * @example
 * ```ts
 * roundToCents(40.004) // returns 40
 * roundToCents(12.345) // returns 12.35
 * ```
 */
export function roundToCents(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Parses a dollar-formatted string such as "$1,234.56" or "-$12.00".
 * Returns null when nothing numeric remains after stripping "$", "," and spaces.
 */
export function parseDollarAmount(text: string): number | null {
  const cleaned = text.replace(/[$,\s]/g, "");
  if (cleaned === "" || !/^[-+]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

/**
 * Formats a dollar amount with two decimals and no grouping, e.g. "$1234.50".
 */
export function formatDollars(amount: number): string {
  return `$${roundToCents(amount).toFixed(2)}`;
}

/**
 * Formats a percentage (0-100 scale) with two decimals, e.g. "33.33%".
 */
export function formatPercent(percent: number): string {
  return `${roundToCents(percent).toFixed(2)}%`;
}

/**
 * Share of `part` in `whole` on a 0-100 scale; 0 when `whole` is 0.
 */
export function percentOf(part: number, whole: number): number {
  if (whole === 0) {
    return 0;
  }
  return (part / whole) * 100;
}
