import type { CalendarWriter } from "../../calendar/calendarFileWriter";
import { serializeIcs } from "../../calendar/ics";
import type { HolidayConfigRepository } from "../../config/holidayConfigRepository";
import { compileRegion } from "../../holidays/regionCompiler";
import type { IdGenerator } from "../../ids/identifierStore";
import type { Logger } from "../../log/logService";
import { toAppErrorDto } from "../../shared/appError";
import { err, ok, withDetails, type AppErrorDto, type Result } from "../../shared/result";
import type { RegionConfig, YearWindow } from "../../types";
import { APP_ERROR } from "../../shared/appErrorCodes";

export type CompileHolidaysUseCaseDeps = {
  repository: HolidayConfigRepository;
  writer: CalendarWriter;
  window: YearWindow;
  calendar: { prodId: string; namePrefix: string };
  newId: IdGenerator;
  nowMs: () => number;
  log: Logger;
};

export type RegionSummary = {
  region: string;
  /** Куда записан календарь. */
  target: string;
  events: number;
  mintedIds: string[];
};

export type CompileSummary = {
  regions: RegionSummary[];
  failures: Array<{ region: string; error: AppErrorDto }>;
  /** Сколько идентификаторов создано за прогон (по всем регионам). */
  mintedIds: number;
};

/**
 * Полный прогон: конфигурация → календари по регионам → запись конфигурации обратно.
 *
 * Правила отказов:
 * - нет/битая конфигурация: фатально, ни одного календаря не пишем;
 * - ошибка региона: регион пропускается целиком (без частичного файла), остальные идут дальше;
 * - конфигурация сохраняется ровно один раз в конце; если сохранить не удалось, календари уже
 *   записаны, а новые UID будут выпущены заново в следующий прогон.
 */
export class CompileHolidaysUseCase {
  constructor(private readonly deps: CompileHolidaysUseCaseDeps) {}

  async run(): Promise<Result<CompileSummary>> {
    const { log } = this.deps;
    const loaded = await this.deps.repository.load();
    if (!loaded.ok) {
      log.error("Конфигурация: ошибка загрузки", { code: loaded.error.code, cause: loaded.error.cause });
      return loaded;
    }

    const doc = loaded.value;
    const summary: CompileSummary = { regions: [], failures: [], mintedIds: 0 };
    const stamp = new Date(this.deps.nowMs());

    for (const [region, config] of Object.entries(doc)) {
      log.info(`Регион ${region}: обработка`);
      const r = await this.compileAndWrite(region, config, stamp);
      if (!r.ok) {
        log.error(`Регион ${region}: ошибка`, { code: r.error.code, message: r.error.message, cause: r.error.cause });
        summary.failures.push({ region, error: r.error });
        continue;
      }
      summary.regions.push(r.value);
      summary.mintedIds += r.value.mintedIds.length;
      log.info(`Регион ${region}: ok`, { events: r.value.events, minted: r.value.mintedIds.length, target: r.value.target });
    }

    const saved = await this.deps.repository.save(doc);
    if (!saved.ok) {
      log.error("Конфигурация: не удалось сохранить идентификаторы", { code: saved.error.code, cause: saved.error.cause });
      return err(withDetails(saved.error, { calendarsWritten: summary.regions.length }));
    }

    log.info("Готово", { regions: summary.regions.length, failures: summary.failures.length, minted: summary.mintedIds });
    return ok(summary);
  }

  private async compileAndWrite(region: string, config: RegionConfig, stamp: Date): Promise<Result<RegionSummary>> {
    const compiled = compileRegion(region, config, { window: this.deps.window, newId: this.deps.newId });
    if (!compiled.ok) return compiled;

    const calendar = compiled.value;
    for (const key of calendar.mintedIds) this.deps.log.debug(`Регион ${region}: новый UID`, { key });
    for (const key of calendar.replacedIds) this.deps.log.warn(`Регион ${region}: некорректный UID заменён`, { key });

    const text = serializeIcs(calendar, {
      prodId: this.deps.calendar.prodId,
      calendarName: `${this.deps.calendar.namePrefix} ${region}`.trim(),
      dtStamp: stamp,
    });

    try {
      const target = await this.deps.writer.write(region, text);
      return ok({ region, target, events: calendar.events.length, mintedIds: calendar.mintedIds });
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.FS_IO, message: `Не удалось записать календарь региона ${region}`, details: { region } }));
    }
  }
}
