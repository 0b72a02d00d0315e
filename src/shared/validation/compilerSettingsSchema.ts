import { z } from "zod";

/**
 * Runtime-валидация "сырых" настроек компилятора (флаги CLI, встраивание).
 *
 * Важно:
 * - схема описывает именно RAW формат, где числа могут прийти строками (`--start-year 1999`)
 * - окончательная нормализация (defaults/trim/границы) делается в `normalizeSettings()`
 */

const zBool = z.boolean();
const zStr = z.string();
const zNumOrStr = z.union([z.number(), z.string()]);

export const RawCompilerSettingsSchema = z
  .object({
    inputPath: zStr.optional(),
    outputDir: zStr.optional(),
    window: z
      .object({
        startYear: zNumOrStr.optional(),
        endYear: zNumOrStr.optional(),
      })
      .strict()
      .optional(),
    calendar: z
      .object({
        prodId: zStr.optional(),
        namePrefix: zStr.optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        dir: zStr.optional(),
        retentionDays: zNumOrStr.optional(),
        maxEntries: zNumOrStr.optional(),
        debug: zBool.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RawCompilerSettings = z.infer<typeof RawCompilerSettingsSchema>;
