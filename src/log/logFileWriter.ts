import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { LogEntry } from "./logService";

/**
 * Писатель лога в папку на диске.
 *
 * Пишет батчами с небольшой задержкой, чтобы не дёргать диск на каждую запись.
 * В конце прогона CLI обязательно вызывает `flush()`: таймер не держит процесс.
 *
 * Формат файла: `YYYY-MM-DD.log`, одна запись = одна строка.
 */
export class LogFileWriter {
  private readonly logsDirPath: string;
  private readonly retentionDays: number;
  private readonly flushDelayMs: number;
  private flushTimer?: ReturnType<typeof setTimeout>;
  private pending: LogEntry[] = [];
  private lastFlush: Promise<void> = Promise.resolve();

  constructor(params: { logsDirPath: string; retentionDays?: number; flushDelayMs?: number }) {
    this.logsDirPath = params.logsDirPath;
    this.retentionDays = normalizeRetentionDays(params.retentionDays ?? 7);
    this.flushDelayMs = Math.max(0, params.flushDelayMs ?? 500);
  }

  /** Поставить запись в очередь на запись в файл лога. */
  enqueue(entry: LogEntry) {
    if (!this.logsDirPath) return;

    this.pending.push(entry);
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = undefined;
        this.lastFlush = this.flush().catch((e: unknown) => {
          // Лог писать уже некуда: сообщаем напрямую в stderr.
          process.stderr.write(`LogFileWriter: не удалось записать лог: ${String(e)}\n`);
        });
      }, this.flushDelayMs);
      this.flushTimer.unref?.();
    }
  }

  /** Записать всё накопленное (и дождаться фоновой записи, если она уже идёт). */
  async flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
    await this.lastFlush;

    const batch = this.pending;
    this.pending = [];
    if (batch.length === 0 || !this.logsDirPath) return;

    await fs.mkdir(this.logsDirPath, { recursive: true });

    // Группируем по дате (YYYY-MM-DD)
    const byDate = new Map<string, LogEntry[]>();
    for (const e of batch) {
      const d = formatDateYmd(new Date(e.ts));
      const arr = byDate.get(d) ?? [];
      arr.push(e);
      byDate.set(d, arr);
    }

    for (const [ymd, entries] of byDate) {
      const filePath = path.join(this.logsDirPath, `${ymd}.log`);
      await fs.appendFile(filePath, entries.map(formatLogLine).join("\n") + "\n", { encoding: "utf-8" });
    }

    await this.cleanupOldLogFiles();
  }

  /**
   * Удалить старые лог‑файлы согласно `retentionDays`.
   *
   * Правило: храним `retentionDays` дней, включая сегодняшний.
   * Пример: retentionDays=7 → сегодня + последние 6 дней, всё старше удаляем.
   */
  async cleanupOldLogFiles(nowMs: number = Date.now()): Promise<void> {
    if (!this.logsDirPath) return;

    let files: string[];
    try {
      files = await fs.readdir(this.logsDirPath);
    } catch (e) {
      if (isMissingDir(e)) return;
      throw e;
    }

    const nowUtcMidnight = utcMidnightMs(nowMs);
    for (const name of files) {
      const m = /^(\d{4})-(\d{2})-(\d{2})\.log$/.exec(name);
      if (!m) continue;
      const fileUtcMidnight = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
      const ageDays = Math.floor((nowUtcMidnight - fileUtcMidnight) / MS_PER_DAY);
      if (ageDays >= this.retentionDays) {
        await fs.rm(path.join(this.logsDirPath, name), { force: true });
      }
    }
  }
}

const MS_PER_DAY = 24 * 60 * 60_000;

function normalizeRetentionDays(v: number): number {
  if (!Number.isFinite(v)) return 7;
  return Math.min(365, Math.max(1, Math.floor(v)));
}

function utcMidnightMs(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

function formatDateYmd(d: Date): string {
  const y = String(d.getUTCFullYear());
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

function isMissingDir(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Строка лога: `<ISO ts> LEVEL message {json}`. */
export function formatLogLine(e: LogEntry): string {
  const tsIso = new Date(e.ts).toISOString();
  const level = e.level.toUpperCase();
  if (!e.data || Object.keys(e.data).length === 0) return `${tsIso} ${level} ${e.message}`;
  return `${tsIso} ${level} ${e.message} ${JSON.stringify(e.data)}`;
}
