import { z } from "zod";

/**
 * Runtime-валидация "сырого" файла праздников (`calendar.json`).
 *
 * Схема проверяет только форму документа. Значения `date`/`diff` разбираются позже, по регионам:
 * битая дата должна валить свой регион, а не весь прогон.
 *
 * Все незнакомые ключи сохраняются (passthrough): файл перезаписывается целиком.
 */

const HolidayEntrySchema = z.record(z.string(), z.unknown());
const HolidayGroupSchema = z.record(z.string(), HolidayEntrySchema);

export const RegionConfigSchema = z
  .object({
    repeat: HolidayGroupSchema.optional(),
    easter: HolidayGroupSchema.optional(),
  })
  .passthrough();

export const HolidayConfigDocumentSchema = z.record(z.string(), RegionConfigSchema);
