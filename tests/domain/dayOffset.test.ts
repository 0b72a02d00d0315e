import { describe, expect, it } from "vitest";
import { parseDayOffset, parseMonthDay } from "../../src/domain/policies/dayOffset";
import { AppError } from "../../src/shared/appError";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof AppError ? e.dto.code : "not-app-error";
  }
  return undefined;
}

describe("domain/policies/dayOffset", () => {
  it("parseDayOffset: P-1D / P40D / P+3D", () => {
    expect(parseDayOffset("P-1D")).toBe(-1);
    expect(parseDayOffset("P40D")).toBe(40);
    expect(parseDayOffset(" P+3D ")).toBe(3);
  });

  it("parseDayOffset: P-0D даёт обычный 0", () => {
    expect(Object.is(parseDayOffset("P-0D"), 0)).toBe(true);
  });

  it.each(["P1.5D", "P1W", "PT1H", "P-D", "1D", "P1M", ""])("parseDayOffset(%j) → E_CONFIG", (raw) => {
    expect(codeOf(() => parseDayOffset(raw))).toBe("E_CONFIG");
  });

  it("parseDayOffset: не строка → E_CONFIG", () => {
    expect(codeOf(() => parseDayOffset(5))).toBe("E_CONFIG");
    expect(codeOf(() => parseDayOffset(undefined))).toBe("E_CONFIG");
  });

  it("parseMonthDay: MMDD, 29 февраля допустимо", () => {
    expect(parseMonthDay("0101")).toEqual({ month: 1, day: 1 });
    expect(parseMonthDay("1231")).toEqual({ month: 12, day: 31 });
    expect(parseMonthDay("0229")).toEqual({ month: 2, day: 29 });
  });

  it.each(["0230", "1301", "0001", "0100", "101", "01-01", "abcd"])("parseMonthDay(%j) → E_CONFIG", (raw) => {
    expect(codeOf(() => parseMonthDay(raw))).toBe("E_CONFIG");
  });
});
