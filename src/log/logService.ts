/** Уровень записи лога. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Одна запись лога (в памяти, в консоли и/или в файле). */
export interface LogEntry {
  /** Unix time в мс. */
  ts: number;
  level: LogLevel;
  message: string;
  /** Доп. данные (для диагностики). */
  data?: Record<string, unknown>;
}

/** Узкий контракт логгера, который получают use-case'ы и сервисы. */
export type Logger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

const MAX_STRING_CHARS = 4000;
const MAX_ARRAY_ITEMS = 200;
const MAX_OBJECT_KEYS = 200;

/**
 * In-memory лог прогона.
 *
 * Каждая запись уходит в `onEntry` (консоль, файл) и остаётся в кольцевом буфере на
 * `maxEntries` записей; `list()` отдаёт его копию для встраивания и тестов. CLI буфер не читает.
 */
export class LogService implements Logger {
  private readonly maxEntries: number;
  private entries: LogEntry[] = [];
  private debugEnabled = false;

  /** @param onEntry Коллбек на каждую новую запись (например, для записи в консоль/файл). */
  constructor(
    maxEntries: number,
    private readonly onEntry?: (entry: LogEntry) => void,
    private readonly nowMs: () => number = () => Date.now(),
  ) {
    this.maxEntries = Math.max(10, maxEntries);
  }

  /** debug-записи по умолчанию отбрасываются. */
  setDebugEnabled(enabled: boolean) {
    this.debugEnabled = enabled;
  }

  /** Получить копию текущих записей. */
  list(): LogEntry[] {
    return this.entries.slice();
  }

  /**
   * Логгер в скоупе: префикс сообщения + фиксированный контекст.
   *
   * Пример:
   *   const log = base.scoped("Регион", { region: "BY" });
   *   log.info("событий: 42");
   */
  scoped(scope: string, fixed?: Record<string, unknown>): Logger {
    const prefix = scope.trim();
    const withPrefix = (message: string) => (prefix ? `${prefix}: ${message}` : message);
    const merge = (data?: Record<string, unknown>) => {
      if (!fixed && !data) return undefined;
      return { ...(fixed ?? {}), ...(data ?? {}) };
    };
    return {
      debug: (message, data) => this.debug(withPrefix(message), merge(data)),
      info: (message, data) => this.info(withPrefix(message), merge(data)),
      warn: (message, data) => this.warn(withPrefix(message), merge(data)),
      error: (message, data) => this.error(withPrefix(message), merge(data)),
    };
  }

  debug(message: string, data?: Record<string, unknown>) {
    if (!this.debugEnabled) return;
    this.push({ ts: this.nowMs(), level: "debug", message, data });
  }

  info(message: string, data?: Record<string, unknown>) {
    this.push({ ts: this.nowMs(), level: "info", message, data });
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.push({ ts: this.nowMs(), level: "warn", message, data });
  }

  error(message: string, data?: Record<string, unknown>) {
    this.push({ ts: this.nowMs(), level: "error", message, data });
  }

  private push(e: LogEntry) {
    const safe = sanitizeLogEntry(e);
    this.entries.push(safe);
    this.trim();
    this.onEntry?.(safe);
  }

  private trim() {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }
}

function sanitizeLogEntry(e: LogEntry): LogEntry {
  return {
    ...e,
    message: truncate(e.message),
    data: e.data ? sanitizeRecord(e.data, 0) : undefined,
  };
}

function truncate(s: string): string {
  if (s.length > MAX_STRING_CHARS) return s.slice(0, MAX_STRING_CHARS) + "...[truncated]";
  return s;
}

function sanitizeRecord(obj: object, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const entries = Object.entries(obj);
  for (const [k, val] of entries.slice(0, MAX_OBJECT_KEYS)) out[k] = sanitizeUnknown(val, depth + 1);
  if (entries.length > MAX_OBJECT_KEYS) out["[truncated]"] = `${entries.length - MAX_OBJECT_KEYS} keys`;
  return out;
}

function sanitizeUnknown(v: unknown, depth: number): unknown {
  if (depth > 6) return "[truncated]";
  if (v == null) return v;

  if (typeof v === "string") return truncate(v);
  if (typeof v === "number" || typeof v === "boolean") return v;

  // Error: ключевой тип для диагностики: достаём stack/cause.
  if (v instanceof Error) {
    return {
      name: v.name,
      message: truncate(v.message),
      stack: v.stack ? truncate(v.stack) : undefined,
      cause: v.cause != null ? sanitizeUnknown(v.cause, depth + 1) : undefined,
    };
  }

  if (Array.isArray(v)) {
    const out = v.slice(0, MAX_ARRAY_ITEMS).map((x) => sanitizeUnknown(x, depth + 1));
    if (v.length > MAX_ARRAY_ITEMS) out.push("[truncated]");
    return out;
  }

  if (typeof v === "object") return sanitizeRecord(v, depth);

  return truncate(String(v));
}
