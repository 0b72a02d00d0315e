import "reflect-metadata";
import { container, type DependencyContainer } from "tsyringe";
import { CompileHolidaysUseCase } from "../../application/compile/compileHolidaysUseCase";
import { CalendarFileWriter, type CalendarWriter } from "../../calendar/calendarFileWriter";
import { JsonFileHolidayConfigRepository, type HolidayConfigRepository } from "../../config/holidayConfigRepository";
import { randomUuidV4, type IdGenerator } from "../../ids/identifierStore";
import { LogFileWriter } from "../../log/logFileWriter";
import { LogService } from "../../log/logService";
import type { LogEntry } from "../../log/logService";
import type { CompilerSettings } from "../../settingsStore";

/**
 * Tsyringe container на один прогон компилятора (child container).
 *
 * DI без декораторов/emitDecoratorMetadata: регистрируем зависимости явно (useValue/useFactory),
 * чтобы тесты могли подменить любой порт через `overrides`.
 */
export function createCompilerContainer(params: {
  settings: CompilerSettings;
  /** Куда отдавать каждую запись лога помимо файла (консоль). */
  logSink?: (entry: LogEntry) => void;
  overrides?: {
    nowMs?: () => number;
    newId?: IdGenerator;
    repository?: HolidayConfigRepository;
    writer?: CalendarWriter;
  };
}): DependencyContainer {
  const c = container.createChildContainer();
  const { settings, overrides } = params;

  c.register<CompilerSettings>("compiler.settings", { useValue: settings });
  c.register<() => number>("clock.nowMs", { useValue: overrides?.nowMs ?? (() => Date.now()) });
  c.register<IdGenerator>("ids.newId", { useValue: overrides?.newId ?? randomUuidV4 });

  // Лог: один LogService на контейнер, файл: только если задана папка.
  const fileWriter = settings.log.dir ? new LogFileWriter({ logsDirPath: settings.log.dir, retentionDays: settings.log.retentionDays }) : null;
  // useFactory, а не useValue: tsyringe не считает `null` значением провайдера.
  c.register<LogFileWriter | null>("log.fileWriter", { useFactory: () => fileWriter });
  const logService = new LogService(
    settings.log.maxEntries,
    (entry) => {
      params.logSink?.(entry);
      fileWriter?.enqueue(entry);
    },
    c.resolve<() => number>("clock.nowMs"),
  );
  logService.setDebugEnabled(settings.log.debug);
  c.register<LogService>("log.service", { useValue: logService });

  c.register<HolidayConfigRepository>("config.repository", {
    useValue: overrides?.repository ?? new JsonFileHolidayConfigRepository(settings.inputPath),
  });
  c.register<CalendarWriter>("calendar.writer", {
    useValue: overrides?.writer ?? new CalendarFileWriter(settings.outputDir),
  });

  c.register(CompileHolidaysUseCase, {
    useFactory: (cc) => {
      const s = cc.resolve<CompilerSettings>("compiler.settings");
      return new CompileHolidaysUseCase({
        repository: cc.resolve<HolidayConfigRepository>("config.repository"),
        writer: cc.resolve<CalendarWriter>("calendar.writer"),
        window: s.window,
        calendar: s.calendar,
        newId: cc.resolve<IdGenerator>("ids.newId"),
        nowMs: cc.resolve<() => number>("clock.nowMs"),
        log: cc.resolve<LogService>("log.service").scoped("Компилятор"),
      });
    },
  });

  return c;
}
