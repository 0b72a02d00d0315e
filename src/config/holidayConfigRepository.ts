import * as fs from "node:fs/promises";
import * as path from "node:path";
import { toAppErrorDto } from "../shared/appError";
import { err, ok, type Result } from "../shared/result";
import { HolidayConfigDocumentSchema } from "../shared/validation/holidayConfigSchema";
import type { HolidayConfigDocument } from "../types";
import { APP_ERROR } from "../shared/appErrorCodes";

/**
 * Хранилище конфигурации праздников (оно же: хранилище идентификаторов правил).
 *
 * Жизненный цикл за прогон: один `load()` в начале, один `save()` в конце.
 */
export interface HolidayConfigRepository {
  load(): Promise<Result<HolidayConfigDocument>>;
  save(doc: HolidayConfigDocument): Promise<Result<void>>;
}

/** Файл `calendar.json` на диске. */
export class JsonFileHolidayConfigRepository implements HolidayConfigRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Result<HolidayConfigDocument>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      const notFound = isNodeError(e) && e.code === "ENOENT";
      return err(
        toAppErrorDto(e, {
          code: notFound ? APP_ERROR.NOT_FOUND : APP_ERROR.FS_IO,
          message: notFound ? `Файл конфигурации не найден: ${this.filePath}` : `Не удалось прочитать конфигурацию: ${this.filePath}`,
          details: { filePath: this.filePath },
        }),
      );
    }
    return parseHolidayConfig(raw, this.filePath);
  }

  async save(doc: HolidayConfigDocument): Promise<Result<void>> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, formatHolidayConfig(doc), "utf8");
      return ok(undefined);
    } catch (e) {
      return err(
        toAppErrorDto(e, {
          code: APP_ERROR.FS_IO,
          message: `Не удалось сохранить конфигурацию: ${this.filePath}`,
          details: { filePath: this.filePath },
        }),
      );
    }
  }
}

/** In-memory вариант (тесты, встраивание). Хранит JSON-текст, чтобы load() всегда отдавал свежую копию. */
export class InMemoryHolidayConfigRepository implements HolidayConfigRepository {
  private text: string | null;
  saves = 0;

  constructor(initial?: HolidayConfigDocument) {
    this.text = initial ? formatHolidayConfig(initial) : null;
  }

  async load(): Promise<Result<HolidayConfigDocument>> {
    if (this.text == null) return err({ code: APP_ERROR.NOT_FOUND, message: "Конфигурация не задана" });
    return parseHolidayConfig(this.text, "memory");
  }

  async save(doc: HolidayConfigDocument): Promise<Result<void>> {
    this.text = formatHolidayConfig(doc);
    this.saves++;
    return ok(undefined);
  }

  /** Текущее сохранённое содержимое (как было бы на диске). */
  snapshot(): string | null {
    return this.text;
  }
}

export function parseHolidayConfig(text: string, source: string): Result<HolidayConfigDocument> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    return err(toAppErrorDto(e, { code: APP_ERROR.CONFIG, message: `Конфигурация не является JSON: ${source}` }));
  }
  const parsed = HolidayConfigDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return err({
      code: APP_ERROR.CONFIG,
      message: `Некорректная структура конфигурации: ${source}`,
      cause: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("\n"),
    });
  }
  return ok(parsed.data);
}

/** Стабильный формат файла: ключи отсортированы рекурсивно, отступ 4 пробела. */
export function formatHolidayConfig(doc: HolidayConfigDocument): string {
  return JSON.stringify(sortKeysDeep(doc), null, 4) + "\n";
}

function sortKeysDeep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== "object" || v === null) return v;
  const out: Record<string, unknown> = {};
  for (const [k, val] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    out[k] = sortKeysDeep(val);
  }
  return out;
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
