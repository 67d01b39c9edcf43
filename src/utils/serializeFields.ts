/**
 * Serializes a field map into an `application/x-www-form-urlencoded` string,
 * keeping insertion order.
 */
export function serializeFields(fields: Readonly<Record<string, string>>): string {
  return new URLSearchParams(Object.entries(fields)).toString();
}
