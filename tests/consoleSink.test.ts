import { describe, expect, it } from "vitest";
import { createConsoleSink, formatConsoleLine } from "../src/log/consoleSink";

describe("consoleSink", () => {
  it("formatConsoleLine: info без уровня, остальные с уровнем", () => {
    expect(formatConsoleLine({ ts: 0, level: "info", message: "Регион BY: обработка" })).toBe("Регион BY: обработка");
    expect(formatConsoleLine({ ts: 0, level: "error", message: "x", data: { code: "E_CONFIG" } })).toBe('ERROR x {"code":"E_CONFIG"}');
  });

  it("info/debug → out, warn/error → err", () => {
    const out: string[] = [];
    const errs: string[] = [];
    const sink = createConsoleSink({ out: { write: (s) => out.push(s) }, err: { write: (s) => errs.push(s) } });

    sink({ ts: 0, level: "info", message: "a" });
    sink({ ts: 0, level: "debug", message: "b" });
    sink({ ts: 0, level: "warn", message: "c" });
    sink({ ts: 0, level: "error", message: "d" });

    expect(out).toEqual(["a\n", "DEBUG b\n"]);
    expect(errs).toEqual(["WARN c\n", "ERROR d\n"]);
  });
});
