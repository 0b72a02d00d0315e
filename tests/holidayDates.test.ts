import { describe, expect, it } from "vitest";
import { formatIsoDate } from "../src/domain/policies/calendarDate";
import { bucketByMonthDay, expandHolidayDates } from "../src/holidays/holidayDates";

describe("holidayDates", () => {
  it("фиксированный праздник: одна дата на каждый год окна", () => {
    const dates = expandHolidayDates({ kind: "fixed", name: "Neujahr", month: 1, day: 1, entry: {} }, { startYear: 1999, endYear: 2001 });
    expect(dates.map(formatIsoDate)).toEqual(["1999-01-01", "2000-01-01", "2001-01-01"]);
  });

  it("29 февраля: только високосные годы окна", () => {
    const dates = expandHolidayDates({ kind: "fixed", name: "Schalttag", month: 2, day: 29, entry: {} }, { startYear: 1899, endYear: 2004 });
    expect(dates.map(formatIsoDate).slice(0, 2)).toEqual(["1904-02-29", "1908-02-29"]);
    expect(dates.map(formatIsoDate).slice(-3)).toEqual(["1996-02-29", "2000-02-29", "2004-02-29"]);
    expect(dates).toHaveLength(26);
  });

  it("подвижный праздник: суббота перед Пасхой + сдвиг", () => {
    const easter = expandHolidayDates({ kind: "movable", name: "Ostersonntag", offsetDays: 1, entry: {} }, { startYear: 2024, endYear: 2025 });
    expect(easter.map(formatIsoDate)).toEqual(["2024-03-31", "2025-04-20"]);

    const goodFriday = expandHolidayDates({ kind: "movable", name: "Karfreitag", offsetDays: -1, entry: {} }, { startYear: 2024, endYear: 2024 });
    expect(goodFriday.map(formatIsoDate)).toEqual(["2024-03-29"]);
  });

  it("большой сдвиг уходит в следующий/предыдущий год без ограничений", () => {
    const forward = expandHolidayDates({ kind: "movable", name: "x", offsetDays: 300, entry: {} }, { startYear: 1999, endYear: 1999 });
    expect(forward.map(formatIsoDate)).toEqual(["2000-01-28"]);

    const backward = expandHolidayDates({ kind: "movable", name: "x", offsetDays: -100, entry: {} }, { startYear: 1999, endYear: 1999 });
    expect(backward.map(formatIsoDate)).toEqual(["1998-12-24"]);
  });

  it("bucketByMonthDay: группирует по month/day итоговой даты, годы по возрастанию без повторов", () => {
    const buckets = bucketByMonthDay([
      { year: 2025, month: 4, day: 20 },
      { year: 1999, month: 4, day: 4 },
      { year: 2003, month: 4, day: 20 },
      { year: 2014, month: 4, day: 20 },
      { year: 2003, month: 4, day: 20 },
      { year: 2000, month: 1, day: 28 },
    ]);
    expect(buckets).toEqual([
      { month: 1, day: 28, years: [2000] },
      { month: 4, day: 4, years: [1999] },
      { month: 4, day: 20, years: [2003, 2014, 2025] },
    ]);
  });
});
