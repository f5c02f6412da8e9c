/**
 * Narrowing helpers for VRM API responses.
 *
 * The VRM API is loose about response shapes (alarms in particular come back
 * under several keys), so every accessor takes unknown and returns a typed
 * value or null.
 */

import type {
  LatestPoint,
  Milliseconds,
  VrmAlarmRecord,
  VrmInstallation,
  VrmStatsRecords,
} from "./types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function firstString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.length > 0) return value;
  }
  return null;
}

function firstPresent(...values: unknown[]): string | number | null {
  for (const value of values) {
    if (typeof value === "string" && value.length > 0) return value;
    if (isFiniteNumber(value)) return value;
  }
  return null;
}

/**
 * Latest usable point in a stats series.
 * Points are [ts, value] or [ts, avg, min, max], so index 1 holds the value
 * or the average. The scan runs from the end and skips points with a missing
 * timestamp or value.
 */
export function lastPointValue(entries: unknown): LatestPoint | null {
  if (!Array.isArray(entries) || entries.length === 0) return null;

  for (let idx = entries.length - 1; idx >= 0; idx--) {
    const point: unknown = entries[idx];
    if (!Array.isArray(point) || point.length < 2) continue;

    const [ts, value] = point;
    if (!isFiniteNumber(ts) || !isFiniteNumber(value)) continue;

    return { timestampMs: Math.trunc(ts) as Milliseconds, value };
  }

  return null;
}

/**
 * Records of a /stats response, or an empty object when absent
 */
export function statsRecords(body: unknown): VrmStatsRecords {
  if (isRecord(body) && isRecord(body.records)) return body.records;
  return {};
}

/**
 * Installations of a /users/{id}/installations response
 */
export function installationRecords(body: unknown): VrmInstallation[] {
  if (!isRecord(body) || !Array.isArray(body.records)) return [];

  const installations: VrmInstallation[] = [];
  for (const record of body.records) {
    if (!isRecord(record) || !isFiniteNumber(record.idSite)) continue;
    installations.push({
      idSite: record.idSite,
      name: typeof record.name === "string" ? record.name : "",
      timezone:
        firstString(record.timezone, record.timeZone, record.tz) ?? undefined,
    });
  }
  return installations;
}

/**
 * User id from a /users/me response
 */
export function userIdFrom(body: unknown): number | null {
  if (isRecord(body) && isRecord(body.user) && isFiniteNumber(body.user.id)) {
    return body.user.id;
  }
  return null;
}

/**
 * Active alarms from an /alarms response.
 * Accepted shapes: { records }, { data: { records } }, { alarms }, { data: { alarms } }
 */
export function extractAlarmRecords(body: unknown): VrmAlarmRecord[] {
  if (!isRecord(body)) return [];
  const data = isRecord(body.data) ? body.data : undefined;

  let records: unknown[] = [];
  if (Array.isArray(body.records)) {
    records = body.records;
  } else if (data && Array.isArray(data.records)) {
    records = data.records;
  } else if (Array.isArray(body.alarms)) {
    records = body.alarms;
  } else if (data && Array.isArray(data.alarms)) {
    records = data.alarms;
  }

  const active: VrmAlarmRecord[] = [];
  for (const alarm of records) {
    if (!isRecord(alarm)) continue;

    const activeFlag = alarm.active;
    const state = alarm.state;
    const isActive =
      activeFlag === true ||
      activeFlag === 1 ||
      state === "active" ||
      state === 1 ||
      state === "1";
    if (!isActive) continue;

    active.push({
      time: firstPresent(alarm.startTime, alarm.timestamp, alarm.time),
      name: firstString(alarm.name, alarm.title, alarm.code),
      severity: firstPresent(alarm.severity),
      message: firstString(alarm.message, alarm.text),
    });
  }
  return active;
}

/**
 * Render an alarm as a single line: "name [severity]: message (since time)"
 */
export function formatAlarm(alarm: VrmAlarmRecord): string {
  let line = alarm.name ?? "alarm";
  if (alarm.severity !== null) line += ` [${alarm.severity}]`;
  if (alarm.message !== null) line += `: ${alarm.message}`;
  if (alarm.time !== null) line += ` (since ${alarm.time})`;
  return line;
}

/**
 * Accent- and case-insensitive form of a name
 */
export function normalizeName(value: string): string {
  return value.normalize("NFD").replace(/\p{Mn}/gu, "").toLowerCase();
}

/**
 * First installation whose name contains one of the candidates
 */
export function pickSiteId(
  installations: VrmInstallation[],
  candidates: readonly string[],
): number | null {
  for (const candidate of candidates) {
    const target = normalizeName(candidate);
    const match = installations.find((it) =>
      normalizeName(it.name).includes(target),
    );
    if (match) return match.idSite;
  }
  return null;
}
