import { GaxiosError } from "gaxios";

/**
 * Extract HTTP status code from gaxios errors thrown by the googleapis clients.
 *
 * @example
 * ```ts
 * const status = getHttpStatusFromError(error);
 * if (status === 401) {
 *   // token revoked or expired
 * }
 * ```
 */
export function getHttpStatusFromError(error: unknown): number | undefined {
  if (error instanceof GaxiosError) {
    return error.status ?? error.response?.status;
  }
  return undefined;
}

/**
 * Message of an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
