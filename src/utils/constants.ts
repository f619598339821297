/**
 * Shared constants for allocation and rebalancing.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** A fund whose target/current ratio is strictly above this is within tolerance. */
export const HOLD_RATIO_LOWER = 0.95;

/** A fund whose target/current ratio is strictly below this is within tolerance. */
export const HOLD_RATIO_UPPER = 1.05;

/** First CSV record (0-indexed, header included) holding a tracked fund. */
export const FIRST_POSITION_ROW = 2;

/** Minimum number of CSV records a positions export must contain. */
export const MIN_POSITION_RECORDS = 5;

/** Column holding the fund symbol. */
export const SYMBOL_COLUMN = 1;

/** Column holding the dollar-formatted current value. */
export const CURRENT_VALUE_COLUMN = 6;

/** Width every report table cell is padded to. */
export const REPORT_CELL_WIDTH = 20;

/** User-facing status messages. */
export const MESSAGES = {
  csvFileError: "you did not enter a csv file",
  invalidAmount: "You did not enter a valid amount",
  strategyCalculated: "Strategy Calculated",
} as const;
