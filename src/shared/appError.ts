import type { AppErrorDto, ErrorCode } from "./result";
import { APP_ERROR } from "./appErrorCodes";

/**
 * Typed error для мест, где удобнее `throw` (чистые политики), но нужно донести код ошибки/контекст
 * до Result-грани.
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = "AppError";
    this.dto = dto;
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError || (isRecord(e) && e.name === "AppError" && isAppErrorDto(e.dto));
}

/** Ошибка конфигурации праздников (битый `date`/`diff` и т.п.). */
export function configError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError({ code: APP_ERROR.CONFIG, message, details });
}

export function toAppErrorDto(e: unknown, fallback: { code: ErrorCode; message: string; details?: Record<string, unknown> }): AppErrorDto {
  if (isAppError(e)) return e.dto;
  // В другом realm (worker, vm) instanceof не сработает: проверяем dto структурно.
  if (isRecord(e) && isAppErrorDto(e.dto)) return e.dto;

  const msg = e instanceof Error ? e.message : "";
  const stack = e instanceof Error && e.stack ? e.stack : "";
  const code = isRecord(e) && typeof e.code === "string" ? e.code : "";
  const bits = [msg, code, stack].filter(Boolean);
  const cause = bits.length ? bits.join("\n") : String(e ?? "неизвестная ошибка");

  return { code: fallback.code, message: fallback.message, cause, details: fallback.details };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isAppErrorDto(v: unknown): v is AppErrorDto {
  return isRecord(v) && typeof v.message === "string" && typeof v.code === "string";
}
