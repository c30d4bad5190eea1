/**
 * pg hands back `timestamptz` as Date; the memory store keeps ISO strings. Both surface as ISO.
 */
export function toIsoString(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toNullableIsoString(value: Date | string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return toIsoString(value);
}
