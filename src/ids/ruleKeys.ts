import { monthDayKey } from "../domain/policies/calendarDate";
import type { CompressedRun } from "../types";

/** Ключ идентификатора фиксированного праздника (одно правило на все годы). */
export const FIXED_RULE_KEY = "uid";

/**
 * Ключ идентификатора серии подвижного праздника: `MMDD_<startYear>_<interval>`.
 *
 * Зависит только от формы серии, а не от порядка её нахождения, поэтому при неизменных
 * определениях ключ (и UID) стабилен между прогонами. `count` в ключ не входит.
 */
export function movableRuleKey(month: number, day: number, run: Pick<CompressedRun, "startYear" | "interval">): string {
  return `${monthDayKey(month, day)}_${run.startYear}_${run.interval}`;
}
