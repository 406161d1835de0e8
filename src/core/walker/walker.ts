/**
 * Depth-first traversal of a record along its descriptor.
 *
 * Fields are visited in declaration order, parents before children. The
 * visitor decides whether each field is omitted and which value is emitted;
 * the walker recurses into emitted records and assembles the output.
 */
import { isRecordValue, mapEntries, readField, setEntry } from '../model/access.js';
import type { FieldDescriptor, RecordDescriptor } from '../model/descriptor.js';
import type { Document } from '../model/types.js';
import { ModelError, ErrorCodes } from '../../utils/errors.js';
import { FieldPath } from './path.js';

export interface FieldVisit {
  readonly field: FieldDescriptor;
  readonly path: FieldPath;
  /** Value read from the record */
  readonly value: unknown;
}

export type VisitDecision =
  | { action: 'omit' }
  | { action: 'emit'; value: unknown };

export interface FieldVisitor {
  visit(visit: FieldVisit): Promise<VisitDecision>;
}

export interface WalkResult {
  /** Nested store-ready document */
  document: Document;
  /**
   * Flattened output keyed by store path. Embedded and referenced records
   * are flattened; collections stay whole at their own path.
   */
  fields: Map<string, unknown>;
}

type Sink = Map<string, unknown> | undefined;

const OMITTED = Symbol('omitted');

export async function walk(
  descriptor: RecordDescriptor,
  record: object,
  visitor: FieldVisitor
): Promise<WalkResult> {
  const fields = new Map<string, unknown>();
  const document = await walkRecord(descriptor, record, visitor, FieldPath.root, fields);
  return { document, fields };
}

async function walkRecord(
  descriptor: RecordDescriptor,
  record: object,
  visitor: FieldVisitor,
  path: FieldPath,
  sink: Sink
): Promise<Document> {
  const document: Document = {};

  for (const field of descriptor.fields) {
    const fieldPath = path.child(field.name);
    const decision = await visitor.visit({
      field,
      path: fieldPath,
      value: readField(record, field.source),
    });
    if (decision.action === 'omit') continue;

    const encoded = await encodeField(field, decision.value, visitor, fieldPath, sink);
    if (encoded === OMITTED) continue;
    setEntry(document, field.name, encoded);
  }

  return document;
}

async function encodeField(
  field: FieldDescriptor,
  value: unknown,
  visitor: FieldVisitor,
  path: FieldPath,
  sink: Sink
): Promise<unknown> {
  switch (field.kind) {
    case 'record':
      return walkRecord(
        requireNested(field),
        value === null || value === undefined ? {} : expectRecord(value, path),
        visitor,
        path,
        sink
      );

    case 'ref':
      if (value === null || value === undefined) return OMITTED;
      return walkRecord(requireNested(field), expectRecord(value, path), visitor, path, sink);

    case 'array':
      return store(sink, path, await encodeArray(requireNested(field), value, visitor, path));

    case 'map':
      return store(sink, path, await encodeMap(requireNested(field), value, visitor, path));

    case 'list':
      return store(sink, path, Array.isArray(value) ? [...value] : value ?? null);

    default:
      return store(sink, path, value ?? null);
  }
}

async function encodeArray(
  nested: RecordDescriptor,
  value: unknown,
  visitor: FieldVisitor,
  path: FieldPath
): Promise<Array<Document | null> | null> {
  if (value === null || value === undefined) return null;
  if (!Array.isArray(value)) {
    throw shapeMismatch(path, 'an array of records');
  }

  const out: Array<Document | null> = [];
  for (const [index, element] of value.entries()) {
    const elementPath = path.element(index);
    out.push(
      element === null || element === undefined
        ? null
        : await walkRecord(nested, expectRecord(element, elementPath), visitor, elementPath, undefined)
    );
  }
  return out;
}

async function encodeMap(
  nested: RecordDescriptor,
  value: unknown,
  visitor: FieldVisitor,
  path: FieldPath
): Promise<Document | null> {
  if (value === null || value === undefined) return null;
  if (!(value instanceof Map) && !isRecordValue(value)) {
    throw shapeMismatch(path, 'a map of records');
  }

  const out: Document = {};
  for (const [key, element] of mapEntries(value)) {
    const elementPath = path.element(key);
    setEntry(
      out,
      key,
      element === null || element === undefined
        ? null
        : await walkRecord(nested, expectRecord(element, elementPath), visitor, elementPath, undefined)
    );
  }
  return out;
}

function store(sink: Sink, path: FieldPath, value: unknown): unknown {
  sink?.set(path.store, value);
  return value;
}

function expectRecord(value: unknown, path: FieldPath): object {
  if (!isRecordValue(value)) {
    throw shapeMismatch(path, 'a record');
  }
  return value;
}

function requireNested(field: FieldDescriptor): RecordDescriptor {
  const nested = field.nested;
  if (!nested) {
    throw new ModelError(ErrorCodes.UNKNOWN_MODEL, `Field "${field.source}" has no nested model`, {
      field: field.source,
    });
  }
  return nested;
}

function shapeMismatch(path: FieldPath, expected: string): ModelError {
  return new ModelError(
    ErrorCodes.RECORD_SHAPE_MISMATCH,
    `Value at ${path.display} is not ${expected}`,
    { path: path.display }
  );
}
