import { serializeReport } from "@/lib/json";
import { DataUnavailableError } from "./errors";
import { assessFreshness, describeFreshness } from "./freshness";
import type { VitalsReportBuilder } from "./report-builder";
import type { ReadingProvider } from "./types";

export const EXIT_CODES = {
  OK: 0,
  FAILED: 1,
  NO_USER: 2,
  NO_INSTALLATIONS: 3,
  INTERRUPTED: 130,
} as const;

export interface RunReportOptions {
  provider: ReadingProvider;
  builder: VitalsReportBuilder;
  staleAfterSeconds: number;
  write: (text: string) => void;
}

/**
 * Fetch, build and print one report
 * @returns Process exit code
 */
export async function runVitalsReport(options: RunReportOptions): Promise<number> {
  const { provider, builder, staleAfterSeconds, write } = options;

  try {
    const report = await builder.fetchReport(provider);
    write(`${serializeReport(report)}\n`);

    const freshness = assessFreshness(report, staleAfterSeconds);
    const message = `[Vitals] ${describeFreshness(freshness)}`;
    if (freshness.status === "connected") {
      console.error(message);
    } else {
      console.warn(message);
    }

    return EXIT_CODES.OK;
  } catch (error) {
    if (!(error instanceof DataUnavailableError)) throw error;

    console.error(`[Vitals] ${error.message}`);
    switch (error.reason) {
      case "no-user":
        return EXIT_CODES.NO_USER;
      case "no-installations":
        return EXIT_CODES.NO_INSTALLATIONS;
      default:
        return EXIT_CODES.FAILED;
    }
  }
}
