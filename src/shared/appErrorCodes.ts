/**
 * Единый набор кодов ошибок (AppErrorDto.code).
 *
 * Принцип: добавляем коды по мере появления новых Result-граней.
 */
export const APP_ERROR = {
  CONFIG: "E_CONFIG",
  NOT_FOUND: "E_NOT_FOUND",
  FS_IO: "E_FS_IO",
  INTERNAL: "E_INTERNAL",
} as const;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];
