import {
  formatUtcMicros,
  formatUtcSeconds,
  isValidEpochMs,
  nowEpochMicros,
} from "@/lib/date-utils";
import { DataUnavailableError } from "./errors";
import type {
  MicrosecondClock,
  RawReading,
  ReadingProvider,
  VitalsReport,
} from "./types";

const NUMERIC_FIELDS = [
  "solarPowerW",
  "gridPowerW",
  "batterySocPct",
  "consumptionPowerW",
] as const;

/**
 * Assembles VitalsReport snapshots from raw readings.
 * Holds no state between calls apart from the injected clock.
 */
export class VitalsReportBuilder {
  private readonly clock: MicrosecondClock;

  constructor(clock: MicrosecondClock = nowEpochMicros) {
    this.clock = clock;
  }

  /**
   * Stamp a raw reading with the query instant and reshape it into the report contract
   * @throws DataUnavailableError if the reading is missing or malformed
   */
  buildReport(rawReading: RawReading | null | undefined): VitalsReport {
    if (!rawReading) {
      throw new DataUnavailableError("No reading was supplied", "unavailable");
    }

    for (const field of NUMERIC_FIELDS) {
      if (!Number.isFinite(rawReading[field])) {
        throw new DataUnavailableError(
          `Reading field ${field} is not a number: ${String(rawReading[field])}`,
          "malformed",
        );
      }
    }

    if (!isValidEpochMs(rawReading.dataTimeMs)) {
      throw new DataUnavailableError(
        `Reading has no valid data timestamp: ${String(rawReading.dataTimeMs)}`,
        "malformed",
      );
    }

    const queriedAt = this.clock();

    return {
      timestamp_utc: formatUtcMicros(queriedAt),
      timestamp_data: formatUtcSeconds(rawReading.dataTimeMs),
      generación: {
        solar: { potencia_w: rawReading.solarPowerW },
        red: { potencia_w: rawReading.gridPowerW },
        bateria: { bateria_soc_pct: rawReading.batterySocPct },
        alarmas: [...rawReading.generationAlarms],
      },
      consumo: {
        potencia_w: rawReading.consumptionPowerW,
        alarmas: [...rawReading.consumptionAlarms],
      },
      notes: [...(rawReading.notes ?? [])],
    };
  }

  /**
   * Obtain one reading from a provider and build the report from it
   * @throws DataUnavailableError wrapping whatever the provider failed with
   */
  async fetchReport(provider: ReadingProvider): Promise<VitalsReport> {
    let reading: RawReading;
    try {
      reading = await provider.fetchReading();
    } catch (error) {
      if (error instanceof DataUnavailableError) throw error;
      const detail = error instanceof Error ? error.message : String(error);
      throw new DataUnavailableError(
        `${provider.displayName} reading unavailable: ${detail}`,
        "unavailable",
        { cause: error },
      );
    }

    return this.buildReport(reading);
  }
}
