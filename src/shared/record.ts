/**
 * Lookups on configuration records keyed by user-supplied names
 */

/**
 * Own entry of `record`, ignoring inherited members such as `toString`
 */
export const ownEntry = <T>(record: Readonly<Record<string, T>>, key: string): T | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined;

export const hasEntry = (record: Readonly<Record<string, unknown>>, key: string): boolean =>
  Object.hasOwn(record, key);
