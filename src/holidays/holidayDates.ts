import { addDays, calendarDate, compareDates, existsInYear } from "../domain/policies/calendarDate";
import { easterAnchor } from "../domain/policies/easterDate";
import type { CalendarDate, HolidayDefinition, MonthDayBucket, YearWindow } from "../types";

/**
 * Развернуть определение праздника в конкретные даты по каждому году окна.
 *
 * Порядок: по исходному году. Для подвижных праздников дата может уйти в соседний месяц
 * или даже год (большие сдвиги), это не ограничивается. Фиксированная дата пропускается в годы,
 * где её нет (29 февраля вне високосных).
 */
export function expandHolidayDates(def: HolidayDefinition, window: YearWindow): CalendarDate[] {
  const out: CalendarDate[] = [];
  for (let year = window.startYear; year <= window.endYear; year++) {
    if (def.kind === "movable") out.push(addDays(easterAnchor(year), def.offsetDays));
    else if (existsInYear(year, def.month, def.day)) out.push(calendarDate(year, def.month, def.day));
  }
  return out;
}

/**
 * Сгруппировать даты по (month, day) итоговой даты.
 *
 * Год бакета: год итоговой даты, а не исходный год итерации: иначе DTSTART серии указывал бы
 * на дату, которой праздник не соответствует.
 */
export function bucketByMonthDay(dates: CalendarDate[]): MonthDayBucket[] {
  const byKey = new Map<string, MonthDayBucket>();
  for (const d of dates) {
    const key = `${d.month}-${d.day}`;
    let bucket = byKey.get(key);
    if (!bucket) {
      bucket = { month: d.month, day: d.day, years: [] };
      byKey.set(key, bucket);
    }
    if (!bucket.years.includes(d.year)) bucket.years.push(d.year);
  }

  const buckets = Array.from(byKey.values());
  for (const b of buckets) b.years.sort((a, c) => a - c);
  return buckets.sort((a, b) => compareDates(calendarDate(0, a.month, a.day), calendarDate(0, b.month, b.day)));
}
