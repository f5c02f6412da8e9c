import { parseUtcInstant } from "@/lib/date-utils";
import type { Freshness, VitalsReport } from "./types";

/**
 * Compare the query instant with the data instant of a report.
 *
 * A lag beyond the tolerance means the source stopped publishing and the
 * report is serving its last known reading. A negative lag beyond the
 * tolerance means the source clock runs ahead of ours.
 */
export function assessFreshness(
  report: VitalsReport,
  staleAfterSeconds: number,
): Freshness {
  const queriedAt = parseUtcInstant(report.timestamp_utc);
  const measuredAt = parseUtcInstant(report.timestamp_data);
  if (queriedAt === null || measuredAt === null) {
    throw new Error(
      `Report timestamps are not UTC ISO8601: ${report.timestamp_utc} / ${report.timestamp_data}`,
    );
  }

  const lagSeconds = (queriedAt - measuredAt) / 1_000_000;

  let status: Freshness["status"] = "connected";
  if (lagSeconds > staleAfterSeconds) {
    status = "stale";
  } else if (lagSeconds < -staleAfterSeconds) {
    status = "clock-skew";
  }

  return { status, lagSeconds, staleAfterSeconds };
}

/**
 * One-line description of a freshness result for logs
 */
export function describeFreshness(freshness: Freshness): string {
  const lag = Math.round(freshness.lagSeconds);
  switch (freshness.status) {
    case "connected":
      return `Source connected (data ${lag}s old)`;
    case "stale":
      return `Source appears disconnected: data is ${lag}s old (tolerance ${freshness.staleAfterSeconds}s)`;
    case "clock-skew":
      return `Source clock is ${-lag}s ahead of query time (tolerance ${freshness.staleAfterSeconds}s)`;
  }
}
