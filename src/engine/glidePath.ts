import { GlidePath } from "../models/GlidePath";

/**
 * Target-date glide paths, checked in this order. Each later date shifts
 * weight from the index funds into bonds.
 */
export const GLIDE_PATHS: readonly GlidePath[] = [
  { key: "2020", token: "2020", bondPct: 20, internationalPct: 30, nationalPct: 50 },
  { key: "2030", token: "2030", bondPct: 30, internationalPct: 27, nationalPct: 43 },
  { key: "2040", token: "2040", bondPct: 40, internationalPct: 23, nationalPct: 37 },
  { key: "2050", token: "2050", bondPct: 50, internationalPct: 19, nationalPct: 31 },
  { key: "2060", token: "2060", bondPct: 60, internationalPct: 15, nationalPct: 25 },
  { key: "2070", token: "2070", bondPct: 70, internationalPct: 11, nationalPct: 19 },
  { key: "2080", token: "2080", bondPct: 80, internationalPct: 8, nationalPct: 12 },
  { key: "2090", token: "2090", bondPct: 90, internationalPct: 4, nationalPct: 6 },
];

/** Used when the label carries no known token: everything in bonds. */
export const DEFAULT_GLIDE_PATH: GlidePath = {
  key: "default",
  token: null,
  bondPct: 100,
  internationalPct: 0,
  nationalPct: 0,
};

/**
 * Selects the glide path whose token appears in the label (typically a
 * filename). First match in table order wins; no match yields the default.
 *
 * @example
 * ```ts
 * selectGlidePath("Portfolio_Positions_2040.csv").key // "2040"
 * selectGlidePath("positions.csv").key // "default"
 * ```
 */
export function selectGlidePath(label: string): GlidePath {
  const match = GLIDE_PATHS.find(
    (path) => path.token !== null && label.includes(path.token)
  );
  return match ?? DEFAULT_GLIDE_PATH;
}

/**
 * Looks up a glide path by key ("2020" ... "2090" or "default").
 */
export function getGlidePath(key: string): GlidePath | null {
  if (key === DEFAULT_GLIDE_PATH.key) {
    return DEFAULT_GLIDE_PATH;
  }
  return GLIDE_PATHS.find((path) => path.key === key) ?? null;
}

export function getAllGlidePaths(): GlidePath[] {
  return [...GLIDE_PATHS, DEFAULT_GLIDE_PATH];
}

/**
 * Returns the glide path's percentages as fractions (bond, international, national).
 */
export function getGlidePathFractions(path: GlidePath): [number, number, number] {
  return [path.bondPct / 100, path.internationalPct / 100, path.nationalPct / 100];
}
