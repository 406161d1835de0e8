/**
 * Field error type definitions.
 */

/**
 * One failed validation, attributed to a field.
 */
export interface FieldError {
  /** Store name of the field */
  field: string;
  /** Source identifier of the field on the record */
  source: string;
  /** Dot path from the record root, including collection positions */
  path: string;
  /** The failing tag token, parameter included (e.g. "min=6") */
  directive: string;
  /** Rule name (e.g. "min") */
  rule: string;
  message: string;
}
