import { randomUUID } from "node:crypto";
import type { HolidayEntry } from "../types";

/** Источник новых идентификаторов (в тестах: детерминированный). */
export type IdGenerator = () => string;

/** Случайный UUID v4 (версия/вариант выставлены, остальное: CSPRNG). */
export const randomUuidV4: IdGenerator = () => randomUUID();

/**
 * Хранилище идентификаторов правил в scope одного праздника.
 *
 * Пишет прямо в persisted-запись праздника (ту же, что потом сохранится в конфиг), поэтому
 * сохранение: одна запись всего документа в конце прогона, а не по ключу.
 * Существующие значения не перегенерируются никогда; устаревшие ключи не удаляются.
 * Исключение: пустое или нестроковое значение под ключом заменяется новым UUID и попадает
 * в `replaced` (use-case пишет об этом warn).
 */
export class IdentifierStore {
  private readonly mintedKeys: string[] = [];
  private readonly replacedKeys: string[] = [];

  constructor(
    private readonly entry: HolidayEntry,
    private readonly newId: IdGenerator,
  ) {}

  getOrCreate(key: string): string {
    const existing = this.entry[key];
    if (typeof existing === "string" && existing.trim()) return existing;

    if (Object.hasOwn(this.entry, key)) this.replacedKeys.push(key);
    const id = this.newId();
    this.entry[key] = id;
    this.mintedKeys.push(key);
    return id;
  }

  /** Ключи, созданные через этот store. */
  get minted(): string[] {
    return this.mintedKeys.slice();
  }

  /** Ключи, чьё битое значение было заменено (подмножество `minted`). */
  get replaced(): string[] {
    return this.replacedKeys.slice();
  }
}
