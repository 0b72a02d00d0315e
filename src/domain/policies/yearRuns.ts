import type { CompressedRun } from "../../types";

/**
 * Сжать набор лет одного (month, day) бакета в арифметические прогрессии.
 *
 * Жадно: берём наименьший оставшийся год `s`, для каждого большего `t` наращиваем прогрессию
 * с шагом `t - s`, оставляем самую длинную (при равенстве: с меньшим шагом). Если ни одна
 * прогрессия не длиннее 1, `s` уходит одиночным годом.
 *
 * Инварианты:
 * - объединение лет всех серий равно входному множеству, каждый год ровно в одной серии;
 * - результат зависит только от множества лет (порядок и дубликаты на входе не важны).
 *
 * Пример: {1999, 2010, 2021, 2085} → [{1999, 11, 3}, {2085, 0, 1}].
 */
export function compressYears(years: Iterable<number>): CompressedRun[] {
  const pool = new Set<number>(years);
  const out: CompressedRun[] = [];

  while (pool.size > 0) {
    const sorted = Array.from(pool).sort((a, b) => a - b);
    const start = sorted[0];

    let best: number[] = [start];
    let bestInterval = 0;
    for (const next of sorted.slice(1)) {
      const interval = next - start;
      const run = [start, next];
      let cur = next;
      while (pool.has(cur + interval)) {
        cur += interval;
        run.push(cur);
      }
      // Строго больше: при равной длине остаётся серия с меньшим шагом (она встретилась раньше).
      if (run.length > best.length) {
        best = run;
        bestInterval = interval;
      }
    }

    for (const y of best) pool.delete(y);
    out.push(best.length > 1 ? { startYear: start, interval: bestInterval, count: best.length } : singleYear(start));
  }

  return out;
}

/** Годы, покрываемые серией. */
export function expandRun(run: CompressedRun): number[] {
  if (run.interval <= 0 || run.count <= 1) return [run.startYear];
  const out: number[] = [];
  for (let i = 0; i < run.count; i++) out.push(run.startYear + i * run.interval);
  return out;
}

/** Одиночный год: это серия без периода. */
export function isSingleYear(run: CompressedRun): boolean {
  return run.interval === 0 || run.count <= 1;
}

function singleYear(year: number): CompressedRun {
  return { startYear: year, interval: 0, count: 1 };
}
