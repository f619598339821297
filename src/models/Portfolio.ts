/**
 * Portfolio data structures
 */

export type FundRole = "bond" | "international" | "national";

/** Tracked funds in the order they appear in a positions export. */
export const FUND_ROLES: readonly FundRole[] = ["bond", "international", "national"];

export interface FundPosition {
  symbol: string;
  currentBalance: number;
}

/**
 * One loaded positions export. Treated as immutable: a new file load
 * produces a new snapshot rather than editing an existing one.
 */
export interface PortfolioSnapshot {
  label: string; // source filename, also carries the glide-path token
  positions: Readonly<Record<FundRole, FundPosition>>;
}

/**
 * Get total balance across the tracked funds
 */
export function getTotalBalance(snapshot: PortfolioSnapshot): number {
  return FUND_ROLES.reduce(
    (sum, role) => sum + snapshot.positions[role].currentBalance,
    0
  );
}

export function createSnapshot(
  label: string,
  positions: Record<FundRole, FundPosition>
): PortfolioSnapshot {
  return Object.freeze({
    label,
    positions: Object.freeze({
      bond: Object.freeze({ ...positions.bond }),
      international: Object.freeze({ ...positions.international }),
      national: Object.freeze({ ...positions.national }),
    }),
  });
}
