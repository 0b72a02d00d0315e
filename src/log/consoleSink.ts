import type { LogEntry } from "./logService";

type Stream = { write: (chunk: string) => unknown };

/**
 * Вывод лога в консоль: info/debug → stdout, warn/error → stderr.
 *
 * Без timestamp: для оператора в терминале он лишний, в файловом логе он есть.
 */
export function createConsoleSink(streams: { out: Stream; err: Stream } = { out: process.stdout, err: process.stderr }) {
  return (e: LogEntry) => {
    const line = formatConsoleLine(e);
    if (e.level === "warn" || e.level === "error") streams.err.write(line + "\n");
    else streams.out.write(line + "\n");
  };
}

export function formatConsoleLine(e: LogEntry): string {
  const level = e.level === "info" ? "" : `${e.level.toUpperCase()} `;
  if (!e.data || Object.keys(e.data).length === 0) return `${level}${e.message}`;
  return `${level}${e.message} ${JSON.stringify(e.data)}`;
}
