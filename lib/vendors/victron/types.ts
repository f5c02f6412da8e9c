/**
 * Victron VRM API types
 *
 * Only the fields this project reads are modelled; everything arrives as
 * unknown JSON and is narrowed in parsing.ts.
 */

export type Milliseconds = number & { readonly __brand: "Milliseconds" };

export interface VrmInstallation {
  idSite: number;
  name: string;
  timezone?: string;
}

/**
 * Venus stats records keyed by attribute code (solar_yield, from_to_grid, bs, ac_loads...)
 */
export type VrmStatsRecords = Record<string, unknown>;

export interface VrmAlarmRecord {
  time: string | number | null;
  name: string | null;
  severity: string | number | null;
  message: string | null;
}

export interface LatestPoint {
  timestampMs: Milliseconds;
  value: number;
}

export type QueryParams = Record<string, string>;
