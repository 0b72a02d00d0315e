import { Command } from "commander";
import { CompileHolidaysUseCase } from "./src/application/compile/compileHolidaysUseCase";
import { createCompilerContainer } from "./src/cli/di/compilerContainer";
import { createConsoleSink } from "./src/log/consoleSink";
import type { LogFileWriter } from "./src/log/logFileWriter";
import { normalizeSettings } from "./src/settingsStore";

type CliOptions = {
  input?: string;
  out?: string;
  startYear?: string;
  endYear?: string;
  prodId?: string;
  namePrefix?: string;
  logDir?: string;
  debug?: boolean;
};

/**
 * CLI компилятора праздников.
 *
 * Wiring:
 * - флаги → "сырые" настройки → `normalizeSettings()`
 * - container → use-case → прогон
 * - exit code 0 только если все регионы записаны и конфигурация сохранена
 */
export async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name("holiday-ics")
    .description("Компилирует праздники (фиксированные и от Пасхи) в ICS-календари по регионам")
    .option("-i, --input <path>", "файл праздников (JSON)")
    .option("-o, --out <dir>", "папка для <region>.ics")
    .option("--start-year <year>", "первый год окна")
    .option("--end-year <year>", "последний год окна")
    .option("--prod-id <id>", "PRODID календаря")
    .option("--name-prefix <text>", "префикс X-WR-CALNAME")
    .option("--log-dir <dir>", "папка для файлового лога")
    .option("--debug", "подробный лог");
  program.parse(argv);
  const opts = program.opts<CliOptions>();

  const settings = normalizeSettings({
    inputPath: opts.input,
    outputDir: opts.out,
    window: { startYear: opts.startYear, endYear: opts.endYear },
    calendar: { prodId: opts.prodId, namePrefix: opts.namePrefix },
    log: { dir: opts.logDir, debug: opts.debug },
  });

  const c = createCompilerContainer({ settings, logSink: createConsoleSink() });
  const result = await c.resolve(CompileHolidaysUseCase).run();
  await c.resolve<LogFileWriter | null>("log.fileWriter")?.flush();

  if (!result.ok) return 1;
  return result.value.failures.length > 0 ? 1 : 0;
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`holiday-ics: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
    process.exitCode = 1;
  },
);
