/** Календарная дата без времени и часового пояса (григорианский календарь). */
export interface CalendarDate {
  year: number;
  /** 1..12 */
  month: number;
  /** 1..31 */
  day: number;
}

/** Окно компиляции (включительно с обеих сторон). */
export interface YearWindow {
  startYear: number;
  endYear: number;
}

/**
 * Сырая persisted-запись праздника из конфигурации.
 *
 * Кроме `date`/`diff` здесь же лежат идентификаторы правил (`uid`, `0331_1999_11`, ...)
 * и любые чужие ключи: их мы обязаны сохранить как есть.
 */
export type HolidayEntry = Record<string, unknown>;

/** Конфигурация одного региона (`repeat`: фиксированные даты, `easter`: от Пасхи). */
export interface RegionConfig {
  repeat?: Record<string, HolidayEntry>;
  easter?: Record<string, HolidayEntry>;
  [key: string]: unknown;
}

/** Весь файл конфигурации: регион → конфигурация региона. */
export type HolidayConfigDocument = Record<string, RegionConfig>;

/** Праздник с фиксированной датой (каждый год без исключений). */
export interface FixedHoliday {
  kind: "fixed";
  name: string;
  month: number;
  day: number;
  /** Persisted-запись праздника (scope для идентификаторов). */
  entry: HolidayEntry;
}

/** Праздник, вычисляемый от субботы перед Пасхой со сдвигом `offsetDays`. */
export interface MovableHoliday {
  kind: "movable";
  name: string;
  offsetDays: number;
  entry: HolidayEntry;
}

export type HolidayDefinition = FixedHoliday | MovableHoliday;

/** Годы одного (month, day) бакета подвижного праздника. */
export interface MonthDayBucket {
  month: number;
  day: number;
  /** По возрастанию, без повторов. */
  years: number[];
}

/**
 * Серия лет `startYear, startYear + interval, ...` длиной `count`.
 *
 * `interval = 0, count = 1`: одиночный год (периодичность не найдена).
 */
export interface CompressedRun {
  startYear: number;
  interval: number;
  count: number;
}

/** Правило повторения (подмножество RRULE, которое мы реально эмитим). */
export interface RecurrenceRule {
  freq: "YEARLY";
  interval?: number;
  count?: number;
  until?: CalendarDate;
}

/** All-day событие календаря (DTEND = DTSTART + 1 день). */
export interface CalendarEvent {
  title: string;
  start: CalendarDate;
  end: CalendarDate;
  uid: string;
  rrule?: RecurrenceRule;
}

/** Скомпилированный календарь одного региона. */
export interface RegionCalendar {
  region: string;
  events: CalendarEvent[];
  /** Ключи идентификаторов, созданных в этом прогоне (для логов/сводки). */
  mintedIds: string[];
  /** Ключи, где пустое/нестроковое значение заменено новым идентификатором. */
  replacedIds: string[];
}
