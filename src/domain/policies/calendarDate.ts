import type { CalendarDate } from "../../types";

const MS_PER_DAY = 24 * 60 * 60_000;

/** Максимальная длина месяца без учёта года (февраль: 29). */
const MAX_DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  return { year, month, day };
}

/**
 * Сдвинуть дату на `days` дней (может перейти через месяц/год).
 *
 * Считаем через UTC, чтобы локальный часовой пояс и DST не сдвигали all-day дату.
 */
export function addDays(d: CalendarDate, days: number): CalendarDate {
  const ms = Date.UTC(d.year, d.month - 1, d.day) + days * MS_PER_DAY;
  const out = new Date(ms);
  return { year: out.getUTCFullYear(), month: out.getUTCMonth() + 1, day: out.getUTCDate() };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** `MMDD` без года. */
export function monthDayKey(month: number, day: number): string {
  return `${pad2(month)}${pad2(day)}`;
}

/** Формат ICS `VALUE=DATE`: `YYYYMMDD`. */
export function formatIcsDate(d: CalendarDate): string {
  return `${String(d.year).padStart(4, "0")}${monthDayKey(d.month, d.day)}`;
}

/** `YYYY-MM-DD` (логи, тесты). */
export function formatIsoDate(d: CalendarDate): string {
  return `${String(d.year).padStart(4, "0")}-${pad2(d.month)}-${pad2(d.day)}`;
}

/**
 * Валидна ли пара month/day хотя бы в одном году.
 *
 * 29 февраля допустимо: проверка делается один раз, а не по каждому году.
 */
export function isValidMonthDay(month: number, day: number): boolean {
  if (!Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= MAX_DAYS_IN_MONTH[month - 1];
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Существует ли дата в конкретном году (29 февраля: только в високосные). */
export function existsInYear(year: number, month: number, day: number): boolean {
  if (!isValidMonthDay(month, day)) return false;
  return month !== 2 || day <= (isLeapYear(year) ? 29 : 28);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
