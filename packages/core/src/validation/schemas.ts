/**
 * Zod schemas for validating dataset schema declarations
 */

import { z } from 'zod';

/** Identifier safe for file names and SQL table suffixes */
export const datasetNameSchema = z
  .string()
  .min(1)
  .max(48)
  .regex(/^[a-z][a-z0-9_]*$/, 'must be lowercase alphanumeric with underscores, starting with a letter');

export const fieldKindSchema = z.enum(['string', 'number', 'integer', 'date', 'datetime']);

export const fieldSpecSchema = z
  .object({
    name: z.string().min(1),
    kind: fieldKindSchema,
    required: z.boolean().default(false),
    source: z.string().min(1).optional(),
    caseFold: z.boolean().optional(),
  })
  .strict();

export const dropPolicySchema = z.enum(['record-absence', 'ignore']);

export const datasetSchemaSchema = z
  .object({
    dataset: datasetNameSchema,
    keyFields: z.array(z.string().min(1)).min(1),
    fields: z.array(fieldSpecSchema).min(1),
    tolerance: z.number().min(0).optional(),
    dropPolicy: dropPolicySchema.optional(),
    absenceValue: z.number().optional(),
    allowEmpty: z.boolean().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const byName = new Map<string, z.infer<typeof fieldSpecSchema>>();
    value.fields.forEach((field, i) => {
      if (byName.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field name: ${field.name}`,
          path: ['fields', i, 'name'],
        });
      }
      byName.set(field.name, field);
    });

    value.keyFields.forEach((keyField, i) => {
      const field = byName.get(keyField);
      if (!field) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Key field '${keyField}' is not declared in fields`,
          path: ['keyFields', i],
        });
        return;
      }
      if (field.kind !== 'string') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Key field '${keyField}' must be of kind 'string' (got '${field.kind}')`,
          path: ['keyFields', i],
        });
      }
    });
  });

export type FieldSpecInput = z.input<typeof fieldSpecSchema>;
export type DatasetSchemaInput = z.input<typeof datasetSchemaSchema>;
