/**
 * Zero values per field kind, used by omission and `required`.
 *
 * The only zero number is 0 (`-0` included); `NaN` is a value.
 */
import { isRecordValue, readField } from './access.js';
import type { FieldDescriptor } from './descriptor.js';

export function isZeroValue(field: FieldDescriptor, value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }

  switch (field.kind) {
    case 'string':
      return value === '';
    case 'number':
      return value === 0;
    case 'boolean':
      return value === false;
    case 'date':
      return value instanceof Date && Number.isNaN(value.getTime());
    case 'list':
    case 'array':
      return Array.isArray(value) && value.length === 0;
    case 'map':
      if (value instanceof Map) return value.size === 0;
      return isRecordValue(value) && Object.keys(value).length === 0;
    case 'record': {
      const nested = field.nested;
      if (!nested || !isRecordValue(value)) return false;
      return nested.fields.every((child) => isZeroValue(child, readField(value, child.source)));
    }
    case 'ref':
    case 'any':
      return false;
  }
}
