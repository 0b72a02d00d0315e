import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Порт записи готового `.ics` (файл, память в тестах). Возвращает путь/адрес результата. */
export interface CalendarWriter {
  write(region: string, icsText: string): Promise<string>;
}

/** Имя файла календаря региона: `<region в нижнем регистре>.ics`. */
export function calendarFileName(region: string): string {
  return `${region.trim().toLowerCase()}.ics`;
}

/** Запись календарей в папку (`docs/` по умолчанию). */
export class CalendarFileWriter implements CalendarWriter {
  constructor(private readonly outputDir: string) {}

  async write(region: string, icsText: string): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, calendarFileName(region));
    await fs.writeFile(filePath, icsText, { encoding: "utf-8" });
    return filePath;
  }
}
