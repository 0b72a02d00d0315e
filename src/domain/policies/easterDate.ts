import type { CalendarDate } from "../../types";
import { addDays } from "./calendarDate";

/**
 * Пасхальное воскресенье (западная/григорианская Пасха).
 *
 * Анонимный григорианский алгоритм (Meeus/Jones/Butcher), без юлианского и православного вариантов.
 */
export function easterSunday(year: number): CalendarDate {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const n = h + l - 7 * m + 114;
  return { year, month: Math.floor(n / 31), day: (n % 31) + 1 };
}

/** Опорная дата подвижных праздников: суббота перед Пасхой. */
export function easterAnchor(year: number): CalendarDate {
  return addDays(easterSunday(year), -1);
}
