import { FundRole } from "../models/Portfolio";
import { FundStrategy, StrategyResult } from "../models/StrategyResult";
import { REPORT_CELL_WIDTH } from "../utils/constants";
import { formatDollars, formatPercent } from "../utils/math";

const TABLE_HEADER = [
  "Symbol",
  "Current Value",
  "Current Allocation",
  "Target Value",
  "Target Allocation",
];

const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

export interface Recommendation {
  role: FundRole;
  text: string; // e.g. "Sell $40.00 FXNAX"
  copyAmount: string; // numeric part of `text`, "" for a hold
}

/**
 * Recommendation text for one fund, e.g. "Buy $50.00 FZROX".
 */
export function describeAction(fund: FundStrategy): string {
  switch (fund.action.type) {
    case "hold":
      return `Looks good for ${fund.symbol}`;
    case "buy":
      return `Buy ${formatDollars(fund.action.amount)} ${fund.symbol}`;
    case "sell":
      return `Sell ${formatDollars(fund.action.amount)} ${fund.symbol}`;
  }
}

/**
 * Pulls the numeric part out of a recommendation so it can be pasted into a
 * trade ticket. All numbers in the text are concatenated.
 *
 * @example
 * ```ts
 * extractTradeAmount("Buy $40.0 Bond Fund") // "40.0"
 * extractTradeAmount("Looks good for FZILX") // ""
 * ```
 */
export function extractTradeAmount(text: string): string {
  return (text.match(NUMBER_PATTERN) ?? []).join("");
}

export function buildRecommendations(result: StrategyResult): Recommendation[] {
  return result.funds.map((fund) => {
    const text = describeAction(fund);
    return { role: fund.role, text, copyAmount: extractTradeAmount(text) };
  });
}

/**
 * Header row followed by one row per fund.
 */
export function buildInfoTable(result: StrategyResult): string[][] {
  const rows = result.funds.map((fund) => [
    fund.symbol,
    formatDollars(fund.currentBalance),
    formatPercent(fund.currentAllocationPct),
    formatDollars(fund.targetValue),
    formatPercent(fund.targetAllocationPct),
  ]);
  return [TABLE_HEADER, ...rows];
}

function formatRow(cells: string[]): string {
  return "|" + cells.map((cell) => `${cell.padEnd(REPORT_CELL_WIDTH)}|`).join("");
}

/**
 * Renders the info table as fixed-width text.
 */
export function formatInfoTable(result: StrategyResult): string {
  const [header, ...rows] = buildInfoTable(result);
  const headerLine = formatRow(header);
  const lines = [
    "Values From CSV:",
    "",
    headerLine,
    "-".repeat(headerLine.length),
    ...rows.map(formatRow),
  ];
  return lines.join("\n") + "\n";
}
