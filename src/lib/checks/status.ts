import { STATUS_CODES } from 'http';

export const STATUS_OK = 200;
export const STATUS_IM_USED = 226;
export const STATUS_MULTIPLE_CHOICES = 300;
export const STATUS_PERMANENT_REDIRECT = 308;

/**
 * Standard reason phrase for a status code, or '' when the code has none
 */
export function reasonPhrase(code: number): string {
  return STATUS_CODES[code] ?? '';
}

/**
 * "{code} {reason phrase}", e.g. "404 Not Found"
 */
export function statusLine(code: number): string {
  return `${code} ${reasonPhrase(code)}`;
}

export function isSuccess(code: number): boolean {
  return code >= STATUS_OK && code <= STATUS_IM_USED;
}

export function isRedirect(code: number): boolean {
  return code >= STATUS_MULTIPLE_CHOICES && code <= STATUS_PERMANENT_REDIRECT;
}
