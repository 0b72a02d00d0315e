import type { AppErrorCode } from "./appErrorCodes";

export type ErrorCode = AppErrorCode;

/**
 * Ошибка, которую компилятор отдаёт наружу (лог, exit code, сводка прогона).
 *
 * - `message`: для оператора, с регионом/праздником в тексте
 * - `cause`: stack или текст исходного исключения
 * - `details`: машинно-читаемый контекст (`region`, `holiday`, `filePath`, ...)
 */
export type AppErrorDto = {
  code: ErrorCode;
  message: string;
  cause?: string;
  details?: Record<string, unknown>;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: AppErrorDto };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AppErrorDto): Result<T> {
  return { ok: false, error };
}

/** Дополнить `details` ошибки, не теряя уже собранный контекст. */
export function withDetails(error: AppErrorDto, extra: Record<string, unknown>): AppErrorDto {
  return { ...error, details: { ...(error.details ?? {}), ...extra } };
}
