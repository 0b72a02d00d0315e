import { describe, expect, it, vi } from "vitest";
import { IdentifierStore, randomUuidV4 } from "../src/ids/identifierStore";
import { FIXED_RULE_KEY, movableRuleKey } from "../src/ids/ruleKeys";
import type { HolidayEntry } from "../src/types";

describe("IdentifierStore", () => {
  it("возвращает существующий идентификатор без генерации", () => {
    const entry: HolidayEntry = { date: "0101", uid: "keep-me" };
    const newId = vi.fn(() => "fresh");
    const store = new IdentifierStore(entry, newId);

    expect(store.getOrCreate("uid")).toBe("keep-me");
    expect(newId).not.toHaveBeenCalled();
    expect(store.minted).toEqual([]);
    expect(entry).toEqual({ date: "0101", uid: "keep-me" });
  });

  it("создаёт и записывает новый идентификатор в persisted-запись", () => {
    const entry: HolidayEntry = { diff: "P1D" };
    const store = new IdentifierStore(entry, () => "id-1");

    expect(store.getOrCreate("0331_2024_0")).toBe("id-1");
    expect(entry).toEqual({ diff: "P1D", "0331_2024_0": "id-1" });
    expect(store.minted).toEqual(["0331_2024_0"]);
  });

  it("повторный запрос того же ключа не генерирует заново", () => {
    const newId = vi.fn(() => "id-1");
    const store = new IdentifierStore({}, newId);
    store.getOrCreate("k");
    expect(store.getOrCreate("k")).toBe("id-1");
    expect(newId).toHaveBeenCalledTimes(1);
  });

  it("пустое/нестроковое значение считается отсутствующим", () => {
    const entry: HolidayEntry = { a: "", b: 42 };
    let n = 0;
    const store = new IdentifierStore(entry, () => `id-${++n}`);
    expect(store.getOrCreate("a")).toBe("id-1");
    expect(store.getOrCreate("b")).toBe("id-2");
    expect(store.minted).toEqual(["a", "b"]);
    expect(store.replaced).toEqual(["a", "b"]);
  });

  it("replaced: новый ключ не считается заменой", () => {
    const store = new IdentifierStore({ uid: null }, () => "id-1");
    store.getOrCreate("0405_2000_0");
    store.getOrCreate("uid");
    expect(store.replaced).toEqual(["uid"]);
  });

  it("не трогает чужие ключи записи", () => {
    const entry: HolidayEntry = { diff: "P2D", note: { any: ["thing"] }, "0401_1999_11": "old" };
    new IdentifierStore(entry, () => "id-1").getOrCreate("0405_2000_0");
    expect(entry).toEqual({ diff: "P2D", note: { any: ["thing"] }, "0401_1999_11": "old", "0405_2000_0": "id-1" });
  });

  it("randomUuidV4: формат UUID v4", () => {
    const id = randomUuidV4();
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(randomUuidV4()).not.toBe(id);
  });
});

describe("ruleKeys", () => {
  it("фиксированный праздник: один ключ на всё окно", () => {
    expect(FIXED_RULE_KEY).toBe("uid");
  });

  it("ключ серии: MMDD_<startYear>_<interval>", () => {
    expect(movableRuleKey(3, 31, { startYear: 2024, interval: 0 })).toBe("0331_2024_0");
    expect(movableRuleKey(4, 4, { startYear: 1999, interval: 11 })).toBe("0404_1999_11");
  });

  it("1/11 и 11/1 дают разные ключи", () => {
    expect(movableRuleKey(1, 11, { startYear: 2000, interval: 0 })).not.toBe(movableRuleKey(11, 1, { startYear: 2000, interval: 0 }));
  });
});
