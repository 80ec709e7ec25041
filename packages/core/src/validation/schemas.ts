/**
 * Zod schemas for validating record schemas loaded from outside the process
 */

import { z } from 'zod';
import type { RecordSchema } from '../types/index.js';

/** Physical record type enum */
export const recordSchemaTypeSchema = z.enum([
  'int8',
  'int16',
  'int32',
  'int64',
  'float32',
  'float64',
  'boolean',
  'string',
  'bytes',
  'array',
  'map',
  'struct',
]);

export const logicalTypeSchema = z.enum(['decimal', 'date', 'time', 'timestamp']);

/** Record schema (recursive for structs, arrays and maps) */
export const recordSchemaSchema: z.ZodType<RecordSchema> = z.lazy(() =>
  z
    .object({
      type: recordSchemaTypeSchema,
      logicalType: logicalTypeSchema.optional(),
      name: z.string().min(1).optional(),
      optional: z.boolean().optional(),
      description: z.string().optional(),
      fields: z
        .array(z.object({ name: z.string().min(1), schema: recordSchemaSchema }))
        .optional(),
      items: recordSchemaSchema.optional(),
      keys: recordSchemaSchema.optional(),
      values: recordSchemaSchema.optional(),
    })
    .strict()
    .superRefine((value, ctx) => {
      if (value.type === 'struct' && !value.fields) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'struct schemas need a fields array',
          path: ['fields'],
        });
      }
      if (value.type === 'array' && !value.items) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'array schemas need an items schema',
          path: ['items'],
        });
      }
      if (value.type === 'map' && (!value.keys || !value.values)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'map schemas need keys and values schemas',
          path: [value.keys ? 'values' : 'keys'],
        });
      }

      const seen = new Set<string>();
      for (let i = 0; i < (value.fields?.length ?? 0); i++) {
        const field = value.fields?.[i];
        if (!field) continue;
        if (seen.has(field.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate field name: ${field.name}`,
            path: ['fields', i, 'name'],
          });
        }
        seen.add(field.name);
      }
    })
);
