/**
 * Date revival for records decoded from JSON, where dates arrive as strings.
 */
import { isRecordValue, mapEntries, readField, setEntry } from './access.js';
import type { FieldDescriptor, RecordDescriptor } from './descriptor.js';

/**
 * Copy a record with string values of `date` fields turned into `Date`s,
 * through embedded records, references, arrays and maps. A blank string
 * becomes an invalid `Date`, the zero date. Other values are copied as is.
 */
export function reviveDates(descriptor: RecordDescriptor, record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    setEntry(out, key, value);
  }
  for (const field of descriptor.fields) {
    if (Object.hasOwn(record, field.source)) {
      setEntry(out, field.source, reviveValue(field, readField(record, field.source)));
    }
  }
  return out;
}

function reviveValue(field: FieldDescriptor, value: unknown): unknown {
  switch (field.kind) {
    case 'date':
      return typeof value === 'string' ? new Date(value) : value;

    case 'record':
    case 'ref':
      return isRecordValue(value) ? reviveNested(field, value) : value;

    case 'array':
      if (!Array.isArray(value)) return value;
      return value.map((element: unknown) => (isRecordValue(element) ? reviveNested(field, element) : element));

    case 'map': {
      if (!isRecordValue(value)) return value;
      const out: Record<string, unknown> = {};
      for (const [key, element] of mapEntries(value)) {
        setEntry(out, key, isRecordValue(element) ? reviveNested(field, element) : element);
      }
      return out;
    }

    default:
      return value;
  }
}

function reviveNested(field: FieldDescriptor, value: object): unknown {
  const nested = field.nested;
  return nested ? reviveDates(nested, value) : value;
}
