import { RawCompilerSettingsSchema, type RawCompilerSettings } from "./shared/validation/compilerSettingsSchema";
import type { YearWindow } from "./types";

/** Настройки одного прогона компилятора. */
export interface CompilerSettings {
  /** Файл праздников (он же хранилище идентификаторов). */
  inputPath: string;
  /** Куда писать `<region>.ics`. */
  outputDir: string;
  window: YearWindow;
  calendar: {
    prodId: string;
    /** X-WR-CALNAME = `${namePrefix} ${region}`. */
    namePrefix: string;
  };
  log: {
    /** Папка для `YYYY-MM-DD.log`; пусто: только консоль. */
    dir: string;
    retentionDays: number;
    maxEntries: number;
    debug: boolean;
  };
}

export const START_YEAR = 1999;
export const END_YEAR = 2099;

/** Григорианский computus имеет смысл только после 1582 года. */
const MIN_YEAR = 1583;
const MAX_YEAR = 9999;

export const DEFAULT_SETTINGS: CompilerSettings = {
  inputPath: "calendar.json",
  outputDir: "docs",
  window: {
    startYear: START_YEAR,
    endYear: END_YEAR,
  },
  calendar: {
    prodId: "-//holiday-ics//Holidays//DE",
    namePrefix: "Feiertage",
  },
  log: {
    dir: "",
    retentionDays: 7,
    maxEntries: 2048,
    debug: false,
  },
};

/**
 * Нормализовать "сырые" настройки.
 *
 * Делает:
 * - заполнение значений по умолчанию
 * - приведение чисел из строк и ограничение границ
 *
 * Невалидный по схеме объект целиком заменяется defaults.
 */
export function normalizeSettings(raw: unknown): CompilerSettings {
  const parsed = RawCompilerSettingsSchema.safeParse(raw ?? {});
  const obj: RawCompilerSettings = parsed.success ? parsed.data : {};

  return {
    inputPath: normalizeString(obj.inputPath, DEFAULT_SETTINGS.inputPath),
    outputDir: normalizeString(obj.outputDir, DEFAULT_SETTINGS.outputDir),
    window: normalizeWindow(obj.window?.startYear, obj.window?.endYear),
    calendar: {
      prodId: normalizeString(obj.calendar?.prodId, DEFAULT_SETTINGS.calendar.prodId),
      namePrefix: normalizeString(obj.calendar?.namePrefix, DEFAULT_SETTINGS.calendar.namePrefix),
    },
    log: {
      dir: (obj.log?.dir ?? DEFAULT_SETTINGS.log.dir).trim(),
      retentionDays: normalizeNumber(obj.log?.retentionDays, { defaultValue: DEFAULT_SETTINGS.log.retentionDays, min: 1, max: 365 }),
      maxEntries: normalizeNumber(obj.log?.maxEntries, { defaultValue: DEFAULT_SETTINGS.log.maxEntries, min: 10, max: 100_000 }),
      debug: obj.log?.debug ?? DEFAULT_SETTINGS.log.debug,
    },
  };
}

function normalizeWindow(startRaw: unknown, endRaw: unknown): YearWindow {
  const startYear = normalizeNumber(startRaw, { defaultValue: DEFAULT_SETTINGS.window.startYear, min: MIN_YEAR, max: MAX_YEAR });
  const endYear = normalizeNumber(endRaw, { defaultValue: DEFAULT_SETTINGS.window.endYear, min: MIN_YEAR, max: MAX_YEAR });
  // Перевёрнутое окно: почти наверняка опечатка во флагах; откатываемся к окну по умолчанию.
  if (startYear > endYear) return { ...DEFAULT_SETTINGS.window };
  return { startYear, endYear };
}

function normalizeString(v: string | undefined, defaultValue: string): string {
  const s = (v ?? "").trim();
  return s || defaultValue;
}

function normalizeNumber(v: unknown, params: { defaultValue: number; min?: number; max?: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  const min = typeof params.min === "number" ? params.min : -Infinity;
  const max = typeof params.max === "number" ? params.max : Infinity;
  return Math.min(max, Math.max(min, Math.floor(n)));
}
