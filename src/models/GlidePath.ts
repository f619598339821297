import { FundRole } from "./Portfolio";

/**
 * Glide path data structure.
 * Percentages are whole percents (e.g., 20 means 20%) and sum to 100.
 */
export interface GlidePath {
  key: string;
  token: string | null; // substring looked for in the file label; null for the default
  bondPct: number;
  internationalPct: number;
  nationalPct: number;
}

/**
 * Get the target percentage (0-100) a glide path assigns to a fund
 */
export function getTargetPercent(path: GlidePath, role: FundRole): number {
  switch (role) {
    case "bond":
      return path.bondPct;
    case "international":
      return path.internationalPct;
    case "national":
      return path.nationalPct;
  }
}
