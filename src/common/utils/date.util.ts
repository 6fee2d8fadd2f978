/**
 * Date -> ISO-8601 문자열. 값이 없으면 null.
 */
export function toIsoString(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}
