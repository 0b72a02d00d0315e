import type { RecurrenceRule } from "../../types";
import { formatIcsDate } from "./calendarDate";

/**
 * Сериализовать RRULE (без префикса `RRULE:`).
 *
 * Порядок ключей фиксированный: чтобы файл не "дребезжал" между прогонами.
 */
export function serializeRecurrenceRule(rule: RecurrenceRule): string {
  const parts = [`FREQ=${rule.freq}`];
  if (rule.interval != null) parts.push(`INTERVAL=${rule.interval}`);
  if (rule.until) parts.push(`UNTIL=${formatIcsDate(rule.until)}`);
  if (rule.count != null) parts.push(`COUNT=${rule.count}`);
  return parts.join(";");
}
