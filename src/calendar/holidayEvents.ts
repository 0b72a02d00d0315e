import { addDays, calendarDate } from "../domain/policies/calendarDate";
import { compressYears, isSingleYear } from "../domain/policies/yearRuns";
import { bucketByMonthDay, expandHolidayDates } from "../holidays/holidayDates";
import type { IdentifierStore } from "../ids/identifierStore";
import { FIXED_RULE_KEY, movableRuleKey } from "../ids/ruleKeys";
import type { CalendarEvent, CompressedRun, FixedHoliday, MovableHoliday, YearWindow } from "../types";

/**
 * Фиксированный праздник: одно событие в первом году окна, где дата существует, повтор каждый
 * год до конца окна.
 *
 * UNTIL (а не бесконечный RRULE): за пределами окна мы ничего не обещаем. Для 29 февраля
 * клиенты сами пропускают невисокосные годы (RFC 5545 3.3.10).
 * `undefined`, если дата не встречается в окне ни разу; идентификатор тогда не создаётся.
 */
export function fixedHolidayEvent(def: FixedHoliday, window: YearWindow, ids: IdentifierStore): CalendarEvent | undefined {
  const dates = expandHolidayDates(def, window);
  if (dates.length === 0) return undefined;
  const start = dates[0];
  return {
    title: def.name,
    start,
    end: addDays(start, 1),
    uid: ids.getOrCreate(FIXED_RULE_KEY),
    rrule: { freq: "YEARLY", until: calendarDate(window.endYear, 12, 31) },
  };
}

/**
 * Событие для одной серии лет.
 *
 * Серия ограничена COUNT, а не UNTIL: следующий год с тем же шагом уже не обязан совпадать
 * с датой праздника.
 */
export function runEvent(title: string, month: number, day: number, run: CompressedRun, uid: string): CalendarEvent {
  const start = calendarDate(run.startYear, month, day);
  const event: CalendarEvent = { title, start, end: addDays(start, 1), uid };
  if (!isSingleYear(run)) {
    event.rrule = { freq: "YEARLY", interval: run.interval, count: run.count };
  }
  return event;
}

/** Подвижный праздник: даты окна → бакеты (month, day) → серии → события. */
export function movableHolidayEvents(def: MovableHoliday, window: YearWindow, ids: IdentifierStore): CalendarEvent[] {
  const out: CalendarEvent[] = [];
  for (const bucket of bucketByMonthDay(expandHolidayDates(def, window))) {
    for (const run of compressYears(bucket.years)) {
      const uid = ids.getOrCreate(movableRuleKey(bucket.month, bucket.day, run));
      out.push(runEvent(def.name, bucket.month, bucket.day, run, uid));
    }
  }
  return out;
}
