import { describe, it, expect } from "@jest/globals";
import {
  extractAlarmRecords,
  formatAlarm,
  installationRecords,
  lastPointValue,
  normalizeName,
  pickSiteId,
  statsRecords,
  userIdFrom,
} from "../parsing";

describe("VRM parsing", () => {
  describe("lastPointValue", () => {
    it("should return the latest point with a value", () => {
      expect(lastPointValue([[1000, 5], [2000, 6], [3000, 7.5]])).toEqual({
        timestampMs: 3000,
        value: 7.5,
      });
    });

    it("should skip trailing points without a usable value", () => {
      expect(lastPointValue([[1000, 5], [2000, null], [3000, Number.NaN]])).toEqual({
        timestampMs: 1000,
        value: 5,
      });
    });

    it("should read the average of [ts, avg, min, max] points", () => {
      expect(lastPointValue([[1000, 80.5, 79, 82]])).toEqual({
        timestampMs: 1000,
        value: 80.5,
      });
    });

    it("should skip points with a missing timestamp or too few entries", () => {
      expect(lastPointValue([[1000, 1], [null, 2], [3000]])).toEqual({
        timestampMs: 1000,
        value: 1,
      });
    });

    it("should return null when nothing is usable", () => {
      expect(lastPointValue(undefined)).toBeNull();
      expect(lastPointValue([])).toBeNull();
      expect(lastPointValue([[null, 5], "x"])).toBeNull();
    });
  });

  describe("extractAlarmRecords", () => {
    const lowBattery = {
      active: true,
      name: "Low battery",
      severity: "warning",
      message: "SOC below 20%",
      startTime: 1758025002,
    };

    it("should read alarms under records", () => {
      expect(extractAlarmRecords({ success: true, records: [lowBattery] })).toEqual([
        {
          time: 1758025002,
          name: "Low battery",
          severity: "warning",
          message: "SOC below 20%",
        },
      ]);
    });

    it("should read alarms under data.records", () => {
      expect(extractAlarmRecords({ data: { records: [lowBattery] } })).toHaveLength(1);
    });

    it("should read alarms under alarms and fall back through name fields", () => {
      expect(
        extractAlarmRecords({ alarms: [{ state: "active", title: "Grid lost" }] }),
      ).toEqual([{ time: null, name: "Grid lost", severity: null, message: null }]);
    });

    it("should read alarms under data.alarms", () => {
      expect(
        extractAlarmRecords({
          data: { alarms: [{ state: 1, code: "E12", text: "Overload", time: "10:00" }] },
        }),
      ).toEqual([{ time: "10:00", name: "E12", severity: null, message: "Overload" }]);
    });

    it("should drop alarms that are not active", () => {
      const alarms = extractAlarmRecords({
        records: [
          { active: false, name: "cleared flag" },
          { state: "cleared", name: "cleared state" },
          { active: 1, name: "still on" },
          { state: "1", name: "string state" },
        ],
      });
      expect(alarms.map((a) => a.name)).toEqual(["still on", "string state"]);
    });

    it("should return nothing for unexpected bodies", () => {
      expect(extractAlarmRecords(null)).toEqual([]);
      expect(extractAlarmRecords({ success: true })).toEqual([]);
      expect(extractAlarmRecords([lowBattery])).toEqual([]);
    });
  });

  describe("formatAlarm", () => {
    it("should include every part that is present", () => {
      expect(
        formatAlarm({
          time: 1758025002,
          name: "Low battery",
          severity: "warning",
          message: "SOC below 20%",
        }),
      ).toBe("Low battery [warning]: SOC below 20% (since 1758025002)");
    });

    it("should fall back to a generic name", () => {
      expect(formatAlarm({ time: null, name: "Grid lost", severity: null, message: null })).toBe(
        "Grid lost",
      );
      expect(formatAlarm({ time: null, name: null, severity: 2, message: null })).toBe(
        "alarm [2]",
      );
    });
  });

  describe("installations", () => {
    it("should keep installations with a numeric id", () => {
      expect(
        installationRecords({
          records: [
            { idSite: 5, name: "Finca", timezone: "Europe/Madrid" },
            { name: "no id" },
            { idSite: 6, timeZone: "UTC" },
          ],
        }),
      ).toEqual([
        { idSite: 5, name: "Finca", timezone: "Europe/Madrid" },
        { idSite: 6, name: "", timezone: "UTC" },
      ]);
    });

    it("should match names regardless of accents and case", () => {
      const installations = [
        { idSite: 1, name: "Casa Consumo" },
        { idSite: 2, name: "GENERACIÓN solar" },
      ];

      expect(normalizeName("Generación Norte")).toBe("generacion norte");
      expect(pickSiteId(installations, ["Generacion", "generación"])).toBe(2);
      expect(pickSiteId(installations, ["Consumo"])).toBe(1);
      expect(pickSiteId(installations, ["Bodega"])).toBeNull();
    });
  });

  describe("users and stats", () => {
    it("should read the user id", () => {
      expect(userIdFrom({ success: true, user: { id: 42, name: "test" } })).toBe(42);
      expect(userIdFrom({ user: { id: "42" } })).toBeNull();
      expect(userIdFrom({})).toBeNull();
    });

    it("should read stats records", () => {
      expect(statsRecords({ records: { bs: [[1000, 84]] } })).toEqual({ bs: [[1000, 84]] });
      expect(statsRecords({ records: [] })).toEqual({});
      expect(statsRecords("not json")).toEqual({});
    });
  });
});
