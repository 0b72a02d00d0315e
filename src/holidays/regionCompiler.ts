import { fixedHolidayEvent, movableHolidayEvents } from "../calendar/holidayEvents";
import { parseDayOffset, parseMonthDay } from "../domain/policies/dayOffset";
import { toAppErrorDto } from "../shared/appError";
import { err, ok, withDetails, type Result } from "../shared/result";
import { IdentifierStore, type IdGenerator } from "../ids/identifierStore";
import type { CalendarEvent, HolidayDefinition, RegionCalendar, RegionConfig, YearWindow } from "../types";
import { APP_ERROR } from "../shared/appErrorCodes";

/**
 * Прочитать все определения региона.
 *
 * Делается целиком до генерации событий: один битый `date`/`diff` валит весь регион раньше,
 * чем будет создан хотя бы один идентификатор.
 */
export function readRegionDefinitions(region: string, config: RegionConfig): Result<HolidayDefinition[]> {
  const out: HolidayDefinition[] = [];
  let current = "";
  try {
    for (const [name, entry] of Object.entries(config.repeat ?? {})) {
      current = name;
      const { month, day } = parseMonthDay(entry.date);
      out.push({ kind: "fixed", name, month, day, entry });
    }
    for (const [name, entry] of Object.entries(config.easter ?? {})) {
      current = name;
      out.push({ kind: "movable", name, offsetDays: parseDayOffset(entry.diff), entry });
    }
    return ok(out);
  } catch (e) {
    const dto = toAppErrorDto(e, { code: APP_ERROR.CONFIG, message: "Некорректное определение праздника" });
    return err(withDetails({ ...dto, message: `${region}/${current}: ${dto.message}` }, { region, holiday: current }));
  }
}

/**
 * Скомпилировать календарь региона: сначала фиксированные праздники, затем подвижные
 * (в порядке определения).
 *
 * Побочный эффект: новые идентификаторы записываются в persisted-записи праздников.
 */
export function compileRegion(
  region: string,
  config: RegionConfig,
  params: { window: YearWindow; newId: IdGenerator },
): Result<RegionCalendar> {
  const defs = readRegionDefinitions(region, config);
  if (!defs.ok) return defs;

  const events: CalendarEvent[] = [];
  const mintedIds: string[] = [];
  const replacedIds: string[] = [];
  for (const def of defs.value) {
    const ids = new IdentifierStore(def.entry, params.newId);
    if (def.kind === "movable") events.push(...movableHolidayEvents(def, params.window, ids));
    else {
      const ev = fixedHolidayEvent(def, params.window, ids);
      if (ev) events.push(ev);
    }
    mintedIds.push(...ids.minted.map((key) => `${def.name}/${key}`));
    replacedIds.push(...ids.replaced.map((key) => `${def.name}/${key}`));
  }

  return ok({ region, events, mintedIds, replacedIds });
}
