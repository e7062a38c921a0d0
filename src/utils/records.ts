/**
 * Records keyed by service names
 *
 * Service names come from users and from `pro status`, so maps keyed by them
 * have no prototype: "__proto__" and "toString" are ordinary keys.
 */

export function createRecord<T>(): Record<string, T> {
  return Object.create(null);
}

/**
 * Own value for a key, ignoring anything inherited
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
