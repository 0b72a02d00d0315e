import { configError } from "../../shared/appError";
import { isValidMonthDay } from "./calendarDate";

/**
 * Распарсить сдвиг в днях в урезанном ISO-8601 формате: `P<целое>D`.
 *
 * Примеры: `P-1D` → -1, `P40D` → 40, `P+3D` → 3.
 * Недели/месяцы/годы/время не поддерживаются: такие строки считаются ошибкой конфигурации.
 */
export function parseDayOffset(raw: unknown): number {
  if (typeof raw !== "string") {
    throw configError("Сдвиг должен быть строкой вида P<n>D", { diff: raw });
  }
  const m = /^P([+-]?\d+)D$/.exec(raw.trim());
  if (!m) {
    throw configError(`Некорректный сдвиг: ${raw}`, { diff: raw });
  }
  const days = Number(m[1]);
  if (!Number.isSafeInteger(days)) {
    throw configError(`Некорректный сдвиг: ${raw}`, { diff: raw });
  }
  // `-0` из "P-0D" нормализуем, чтобы не протекал в ключи/логи.
  return days === 0 ? 0 : days;
}

/** Распарсить фиксированную дату `MMDD`. */
export function parseMonthDay(raw: unknown): { month: number; day: number } {
  if (typeof raw !== "string") {
    throw configError("Дата должна быть строкой вида MMDD", { date: raw });
  }
  const m = /^(\d{2})(\d{2})$/.exec(raw.trim());
  if (!m) {
    throw configError(`Некорректная дата: ${raw}`, { date: raw });
  }
  const month = Number(m[1]);
  const day = Number(m[2]);
  if (!isValidMonthDay(month, day)) {
    throw configError(`Несуществующая дата: ${raw}`, { date: raw });
  }
  return { month, day };
}
