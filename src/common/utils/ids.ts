/** RFC 4122 textual form, any version. */
export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(id: string): boolean {
  return UUID_PATTERN.test(id);
}

/** Listings are stored under the lowercase form. */
export function canonicalUuid(id: string): string {
  return id.toLowerCase();
}
