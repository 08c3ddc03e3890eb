/**
 * Labfolder API v2 response shapes.
 *
 * Only the fields the migration reads are declared; everything else passes
 * through untouched.
 */

import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const labfolderAuthorSchema = z
  .object({
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
  })
  .passthrough();

export const labfolderProjectSchema = z
  .object({
    id: idSchema.nullish(),
    title: z.string().nullish(),
    creation_date: z.string().nullish(),
    number_of_entries: z.number().nullish(),
  })
  .passthrough();

export const labfolderElementRefSchema = z
  .object({
    id: idSchema,
    type: z.string(),
  })
  .passthrough();

export const labfolderEntrySchema = z
  .object({
    id: idSchema,
    project_id: idSchema.nullish(),
    title: z.string().nullish(),
    entry_number: z.number().nullish(),
    creation_date: z.string(),
    version_date: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    author: labfolderAuthorSchema.nullish(),
    project: labfolderProjectSchema.nullish(),
    elements: z.array(labfolderElementRefSchema.nullable()).nullish(),
  })
  .passthrough();

export const labfolderEntryPageSchema = z.array(labfolderEntrySchema);

export type LabfolderEntry = z.infer<typeof labfolderEntrySchema>;
export type LabfolderElementRef = z.infer<typeof labfolderElementRefSchema>;

export const loginResponseSchema = z.object({
  token: z.string().min(1),
});

export const textElementSchema = z
  .object({
    content: z.string().nullish(),
  })
  .passthrough();

/** TABLE and WELL_PLATE share this envelope; `content` is normalized later */
export const sheetElementSchema = z
  .object({
    content: z.unknown().optional(),
    sheets: z.unknown().optional(),
  })
  .passthrough();

export interface LabfolderDataElement {
  type?: string | null;
  title?: string | null;
  value?: string | number | null;
  unit?: string | null;
  description?: string | null;
  children?: LabfolderDataElement[] | null;
}

export const dataElementItemSchema: z.ZodType<LabfolderDataElement> = z.lazy(() =>
  z.object({
    type: z.string().nullish(),
    title: z.string().nullish(),
    value: z.union([z.string(), z.number()]).nullish(),
    unit: z.string().nullish(),
    description: z.string().nullish(),
    children: z.array(dataElementItemSchema).nullish(),
  }),
);

export const dataElementSchema = z
  .object({
    data_elements: z.array(dataElementItemSchema).nullish(),
  })
  .passthrough();

// ─── Exports ─────────────────────────────────────────────────

export const labfolderExportSchema = z
  .object({
    id: idSchema,
    status: z.string().nullish(),
    creation_date: z.string().nullish(),
    download_filename: z.string().nullish(),
  })
  .passthrough();

export const labfolderExportListSchema = z.array(labfolderExportSchema);

export type LabfolderExport = z.infer<typeof labfolderExportSchema>;
