// Configuration for the vitals report

type Env = Record<string, string | undefined>;

/**
 * Parse a numeric environment variable, falling back when absent or invalid
 */
function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Parse a comma-separated list, falling back when absent or empty
 */
function listFromEnv(
  value: string | undefined,
  fallback: readonly string[],
): readonly string[] {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export interface VrmConfig {
  readonly baseUrl: string;
  readonly token: string;
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly retries: number; // total GETs per request
  readonly backoffBaseMs: number;
  readonly totalBudgetMs: number; // overall run budget
  readonly generationSiteNames: readonly string[];
  readonly consumptionSiteNames: readonly string[];
}

export interface ReportConfig {
  readonly staleAfterSeconds: number;
}

export function loadVrmConfig(env: Env = process.env): VrmConfig {
  return {
    baseUrl: env.VRM_BASE_URL || "https://vrmapi.victronenergy.com/v2",
    token: env.VRM_TOKEN || "",
    connectTimeoutMs: numberFromEnv(env.VRM_CONNECT_TIMEOUT, 4) * 1000,
    readTimeoutMs: numberFromEnv(env.VRM_READ_TIMEOUT, 6) * 1000,
    retries: Math.max(1, Math.floor(numberFromEnv(env.VRM_RETRIES, 2))),
    backoffBaseMs: numberFromEnv(env.VRM_BACKOFF_BASE, 0.4) * 1000,
    totalBudgetMs: numberFromEnv(env.VRM_TOTAL_TIMEOUT, 25) * 1000,
    generationSiteNames: listFromEnv(env.VRM_GENERATION_SITE, [
      "Generacion",
      "generación",
    ]),
    consumptionSiteNames: listFromEnv(env.VRM_CONSUMPTION_SITE, ["Consumo"]),
  };
}

const DEFAULT_STALE_AFTER_SECONDS = 900;

export function loadReportConfig(env: Env = process.env): ReportConfig {
  const staleAfterSeconds = numberFromEnv(
    env.VITALS_STALE_AFTER_SECONDS,
    DEFAULT_STALE_AFTER_SECONDS,
  );
  return {
    // never negative
    staleAfterSeconds:
      staleAfterSeconds >= 0 ? staleAfterSeconds : DEFAULT_STALE_AFTER_SECONDS,
  };
}

export const USER_AGENT = "vitals-report/1.0";

// Error Messages
export const ERROR_MESSAGES = {
  MISSING_TOKEN: "VRM_TOKEN is not set. Add it to .env.local or the environment.",
  AUTH_FAILED: "401 Unauthorized (token inválido o sin permisos).",
  NO_USER_ID: "No pude obtener user id con /users/me",
  NO_INSTALLATIONS: "No hay instalaciones en /users/{id}/installations",
  GENERATION_SITE_NOT_FOUND:
    "No se encontró la instalación de generación (nombre contiene 'Generacion' o 'generación').",
  CONSUMPTION_SITE_NOT_FOUND:
    "No se encontró la instalación de consumo (nombre contiene 'Consumo').",
  BUDGET_EXCEEDED: "Global timeout exceeded",
} as const;
