import { ERROR_MESSAGES, type VrmConfig } from "@/config";
import { DataUnavailableError } from "@/lib/vitals/errors";
import type { RawReading, ReadingProvider } from "@/lib/vitals/types";
import type { VrmClient } from "./client";
import { formatAlarm, lastPointValue, pickSiteId } from "./parsing";
import type { LatestPoint, VrmStatsRecords } from "./types";

type SiteNames = Pick<VrmConfig, "generationSiteNames" | "consumptionSiteNames">;

/**
 * Venus stats attribute codes read from each installation
 */
export const VENUS_ATTRIBUTES = {
  solar: "solar_yield",
  grid: "from_to_grid",
  batterySoc: "bs",
  consumption: "ac_loads",
} as const;

/**
 * Reads the generation and consumption installations of a VRM account
 */
export class VrmReadingProvider implements ReadingProvider {
  readonly displayName = "Victron VRM";

  constructor(
    private readonly client: Pick<
      VrmClient,
      "getCurrentUserId" | "listInstallations" | "getVenusStats" | "getActiveAlarms"
    >,
    private readonly siteNames: SiteNames,
  ) {}

  async fetchReading(): Promise<RawReading> {
    const userId = await this.client.getCurrentUserId();
    if (userId === null) {
      throw new DataUnavailableError(ERROR_MESSAGES.NO_USER_ID, "no-user");
    }

    const installations = await this.client.listInstallations(userId);
    if (installations.length === 0) {
      throw new DataUnavailableError(
        ERROR_MESSAGES.NO_INSTALLATIONS,
        "no-installations",
      );
    }

    const generationId = pickSiteId(
      installations,
      this.siteNames.generationSiteNames,
    );
    if (generationId === null) {
      throw new DataUnavailableError(
        ERROR_MESSAGES.GENERATION_SITE_NOT_FOUND,
        "site-not-found",
      );
    }

    const consumptionId = pickSiteId(
      installations,
      this.siteNames.consumptionSiteNames,
    );
    if (consumptionId === null) {
      throw new DataUnavailableError(
        ERROR_MESSAGES.CONSUMPTION_SITE_NOT_FOUND,
        "site-not-found",
      );
    }

    const notes: string[] = [];

    // Generation
    const generationStats = await this.client.getVenusStats(generationId);
    const solar = requirePoint(generationStats, VENUS_ATTRIBUTES.solar, generationId);
    const grid = requirePoint(generationStats, VENUS_ATTRIBUTES.grid, generationId);
    const batterySoc = requirePoint(
      generationStats,
      VENUS_ATTRIBUTES.batterySoc,
      generationId,
    );
    const generationAlarms = await this.readAlarms(
      generationId,
      "generación",
      notes,
    );

    // Consumption
    const consumptionStats = await this.client.getVenusStats(consumptionId);
    const consumption = requirePoint(
      consumptionStats,
      VENUS_ATTRIBUTES.consumption,
      consumptionId,
    );
    const consumptionAlarms = await this.readAlarms(
      consumptionId,
      "consumo",
      notes,
    );

    // Freshest of the four points dates the whole reading
    const dataTimeMs = Math.max(
      solar.timestampMs,
      grid.timestampMs,
      batterySoc.timestampMs,
      consumption.timestampMs,
    );

    return {
      solarPowerW: solar.value,
      gridPowerW: grid.value,
      batterySocPct: batterySoc.value,
      consumptionPowerW: consumption.value,
      generationAlarms,
      consumptionAlarms,
      dataTimeMs,
      notes,
    };
  }

  /**
   * Active alarms as report lines; a failed read becomes a note instead
   */
  private async readAlarms(
    siteId: number,
    label: string,
    notes: string[],
  ): Promise<string[]> {
    try {
      const alarms = await this.client.getActiveAlarms(siteId);
      return alarms.map(formatAlarm);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[VRM] Alarm read failed for site ${siteId}: ${detail}`);
      notes.push(`Error leyendo alarmas de ${label}: ${detail}`);
      return [];
    }
  }
}

function requirePoint(
  records: VrmStatsRecords,
  attribute: string,
  siteId: number,
): LatestPoint {
  const point = lastPointValue(records[attribute]);
  if (!point) {
    throw new DataUnavailableError(
      `No ${attribute} data for installation ${siteId}`,
      "unavailable",
    );
  }
  return point;
}
