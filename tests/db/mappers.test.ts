import { describe, it, expect } from "vitest";
import { toDate, toEnumValue, toMarkerList, toNullableNumber, toNumber } from "../../src/db/mappers";
import { AlertType, isAlertType } from "../../src/types/risk";
import { DataIntegrityError } from "../../src/utils/errors";

describe("column mappers", () => {
  it("should parse numeric strings", () => {
    expect(toNumber("1050.25")).toBe(1050.25);
    expect(toNumber(7)).toBe(7);
  });

  it("should keep null", () => {
    expect(toNullableNumber(null)).toBeNull();
    expect(toNullableNumber("3")).toBe(3);
  });

  it("should accept dates and ISO strings", () => {
    const date = new Date("2024-01-15T14:30:00Z");
    expect(toDate(date)).toBe(date);
    expect(toDate("2024-01-15T14:30:00Z").getTime()).toBe(date.getTime());
  });

  describe("toEnumValue", () => {
    it("should pass a known member through", () => {
      expect(toEnumValue("ANOMALY_DETECTED", isAlertType, "alert_type")).toBe(AlertType.ANOMALY_DETECTED);
    });

    it("should refuse to relabel an unknown value", () => {
      const read = () => toEnumValue("NOT_A_TYPE", isAlertType, "alert_type");
      expect(read).toThrow(DataIntegrityError);
      expect(read).toThrow("Stored alert_type has unknown value NOT_A_TYPE");
    });
  });

  describe("toMarkerList", () => {
    it("should copy well-formed markers", () => {
      expect(toMarkerList([{ timestamp: 1000, transactionId: 1, extra: true }], "applied_markers")).toEqual([
        { timestamp: 1000, transactionId: 1 },
      ]);
      expect(toMarkerList([], "applied_markers")).toEqual([]);
    });

    it("should reject anything that is not a marker list", () => {
      expect(() => toMarkerList({ timestamp: 1000 }, "applied_markers")).toThrow(
        "Stored applied_markers is not a list of feed markers"
      );
      expect(() => toMarkerList([{ timestamp: 1000, transactionId: 1.5 }], "applied_markers")).toThrow(
        DataIntegrityError
      );
    });
  });
});
