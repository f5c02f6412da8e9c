/**
 * Vitals report types
 *
 * Field names of VitalsReport are the wire contract consumed downstream,
 * including the accented "generación" key, so they are kept verbatim here.
 */

export interface VitalsReport {
  timestamp_utc: string; // query instant, microsecond precision
  timestamp_data: string; // measurement instant, second precision
  generación: {
    solar: { potencia_w: number };
    red: { potencia_w: number }; // sign as reported by the source
    bateria: { bateria_soc_pct: number };
    alarmas: string[];
  };
  consumo: {
    potencia_w: number;
    alarmas: string[];
  };
  notes: string[];
}

/**
 * One instantaneous reading as supplied by a ReadingProvider
 */
export interface RawReading {
  solarPowerW: number;
  gridPowerW: number;
  batterySocPct: number;
  consumptionPowerW: number;
  generationAlarms: string[];
  consumptionAlarms: string[];
  dataTimeMs: number; // the data's own measurement instant (epoch ms)
  notes?: string[];
}

/**
 * Source of raw readings (vendor API, local bus, fixture...)
 */
export interface ReadingProvider {
  readonly displayName: string;
  fetchReading(): Promise<RawReading>;
}

/**
 * Clock returning whole microseconds since the epoch
 */
export type MicrosecondClock = () => number;

export type FreshnessStatus = "connected" | "stale" | "clock-skew";

export interface Freshness {
  status: FreshnessStatus;
  lagSeconds: number; // timestamp_utc - timestamp_data
  staleAfterSeconds: number;
}
