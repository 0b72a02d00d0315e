import { describe, expect, it, vi } from "vitest";
import { formatIsoDate } from "../src/domain/policies/calendarDate";
import { serializeIcs } from "../src/calendar/ics";
import { compileRegion, readRegionDefinitions } from "../src/holidays/regionCompiler";
import type { RegionConfig } from "../src/types";

function counterIds() {
  let n = 0;
  return vi.fn(() => `id-${++n}`);
}

describe("regionCompiler", () => {
  it("readRegionDefinitions: фиксированные, затем подвижные, в порядке определения", () => {
    const r = readRegionDefinitions("BY", {
      repeat: { Neujahr: { date: "0101" } },
      easter: { Karfreitag: { diff: "P-1D" }, Ostermontag: { diff: "P2D" } },
    });
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.map((d) => [d.kind, d.name])).toEqual([
      ["fixed", "Neujahr"],
      ["movable", "Karfreitag"],
      ["movable", "Ostermontag"],
    ]);
  });

  it("readRegionDefinitions: битый diff → E_CONFIG с регионом и праздником", () => {
    const r = readRegionDefinitions("BY", { easter: { Karfreitag: { diff: "P1.5D" } } });
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_CONFIG");
    expect(r.error.message).toBe("BY/Karfreitag: Некорректный сдвиг: P1.5D");
    expect(r.error.details).toEqual({ diff: "P1.5D", region: "BY", holiday: "Karfreitag" });
  });

  it("compileRegion: ошибка в одном празднике валит регион до выпуска любых UID", () => {
    const newId = counterIds();
    const config: RegionConfig = {
      repeat: { Neujahr: { date: "0101" } },
      easter: { Karfreitag: { diff: "P1W" } },
    };
    const r = compileRegion("BY", config, { window: { startYear: 1999, endYear: 2099 }, newId });

    expect(r.ok).toBe(false);
    expect(newId).not.toHaveBeenCalled();
    expect(config.repeat?.Neujahr).toEqual({ date: "0101" });
  });

  it("compileRegion: события и выпущенные ключи", () => {
    const config: RegionConfig = {
      repeat: { Neujahr: { date: "0101" } },
      easter: { Ostersonntag: { diff: "P1D" } },
    };
    const r = compileRegion("BY", config, { window: { startYear: 2024, endYear: 2025 }, newId: counterIds() });
    if (!r.ok) throw new Error("expected ok");

    expect(r.value.region).toBe("BY");
    expect(r.value.events.map((e) => [e.title, formatIsoDate(e.start), e.uid])).toEqual([
      ["Neujahr", "2024-01-01", "id-1"],
      ["Ostersonntag", "2024-03-31", "id-2"],
      ["Ostersonntag", "2025-04-20", "id-3"],
    ]);
    expect(r.value.mintedIds).toEqual(["Neujahr/uid", "Ostersonntag/0331_2024_0", "Ostersonntag/0420_2025_0"]);
  });

  it("compileRegion: сдвиг через границу года: бакет и год по итоговой дате", () => {
    const forward: RegionConfig = { easter: { Weit: { diff: "P300D" } } };
    const r1 = compileRegion("X", forward, { window: { startYear: 1999, endYear: 1999 }, newId: counterIds() });
    if (!r1.ok) throw new Error("expected ok");
    expect(r1.value.events.map((e) => formatIsoDate(e.start))).toEqual(["2000-01-28"]);
    expect(forward.easter?.Weit).toEqual({ diff: "P300D", "0128_2000_0": "id-1" });

    const backward: RegionConfig = { easter: { Frueh: { diff: "P-100D" } } };
    const r2 = compileRegion("X", backward, { window: { startYear: 1999, endYear: 1999 }, newId: counterIds() });
    if (!r2.ok) throw new Error("expected ok");
    expect(r2.value.events.map((e) => [formatIsoDate(e.start), formatIsoDate(e.end)])).toEqual([["1998-12-24", "1998-12-25"]]);
    expect(backward.easter?.Frueh).toEqual({ diff: "P-100D", "1224_1998_0": "id-1" });
  });

  it("compileRegion: 29 февраля даёт валидное однодневное событие в високосный год", () => {
    const config: RegionConfig = { repeat: { Schalttag: { date: "0229" } } };
    const r = compileRegion("X", config, { window: { startYear: 1999, endYear: 2099 }, newId: counterIds() });
    if (!r.ok) throw new Error("expected ok");

    const lines = serializeIcs(r.value, { prodId: "-//test//X//DE", calendarName: "X", dtStamp: new Date(Date.UTC(2026, 0, 1)) }).split("\r\n");
    expect(lines).toContain("DTSTART;VALUE=DATE:20000229");
    expect(lines).toContain("DTEND;VALUE=DATE:20000301");
    expect(lines).toContain("RRULE:FREQ=YEARLY;UNTIL=20991231");
    expect(config.repeat?.Schalttag).toEqual({ date: "0229", uid: "id-1" });
  });

  it("compileRegion: битый сохранённый UID заменяется и попадает в replacedIds", () => {
    const config: RegionConfig = { repeat: { Neujahr: { date: "0101", uid: "" } } };
    const r = compileRegion("BY", config, { window: { startYear: 1999, endYear: 2099 }, newId: counterIds() });
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.replacedIds).toEqual(["Neujahr/uid"]);
    expect(r.value.mintedIds).toEqual(["Neujahr/uid"]);
  });

  it("compileRegion: регион без праздников → пустой календарь", () => {
    const r = compileRegion("EMPTY", {}, { window: { startYear: 1999, endYear: 2099 }, newId: counterIds() });
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.events).toEqual([]);
  });
});
