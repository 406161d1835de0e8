/**
 * Schema of YAML model files.
 *
 * @example
 * models:
 *   Address:
 *     fields:
 *       City: { type: string, tag: "city,required" }
 *   User:
 *     fields:
 *       Email: { type: string, tag: "email,required,email" }
 *       Address: { type: ref, model: Address, tag: address }
 */
import { z } from 'zod';
import { NameConventionSchema } from '../config/schema.js';

export const FieldTypeSchema = z.enum([
  'string',
  'number',
  'boolean',
  'date',
  'any',
  'list',
  'record',
  'ref',
  'array',
  'map',
]);

const NESTED_TYPES: ReadonlySet<string> = new Set(['record', 'ref', 'array', 'map']);

export const FieldEntrySchema = z
  .object({
    type: FieldTypeSchema,
    tag: z.string().default(''),
    /** Element model for record, ref, array and map fields */
    model: z.string().optional(),
  })
  .refine((entry) => !NESTED_TYPES.has(entry.type) || entry.model !== undefined, {
    message: 'record, ref, array and map fields need a model',
  });

export const ModelEntrySchema = z.object({
  name_convention: NameConventionSchema.optional(),
  fields: z.record(z.string(), FieldEntrySchema),
});

export const ModelFileSchema = z.object({
  models: z.record(z.string(), ModelEntrySchema),
});

export type FieldEntry = z.infer<typeof FieldEntrySchema>;
export type ModelEntry = z.infer<typeof ModelEntrySchema>;
export type ModelFile = z.infer<typeof ModelFileSchema>;
