/**
 * Reading values off record instances. The one place that indexes
 * records by source identifier.
 */

/**
 * Whether a value can be walked as a record: a non-null object that is
 * not an array, Date or Map.
 */
export function isRecordValue(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Map)
  );
}

/**
 * Narrow an untyped value (e.g. parsed JSON) to a record.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return isRecordValue(value);
}

export function readField(record: object, source: string): unknown {
  // An absent "__proto__" would otherwise read the prototype
  if (source === '__proto__' && !Object.hasOwn(record, source)) {
    return undefined;
  }
  return Reflect.get(record, source);
}

/**
 * Add an own enumerable key. Plain assignment would set the prototype
 * for a "__proto__" key taken from parsed input.
 */
export function setEntry(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Entries of a map-kind value, keyed by string.
 */
export function mapEntries(value: object): Array<[string, unknown]> {
  if (value instanceof Map) {
    return Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]);
  }
  return Object.entries(value);
}
