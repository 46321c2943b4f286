import { z } from 'zod';

// Rows come back from a client that may have edited them; any scalar is
// accepted and written as text.
const exportCell = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((value) =>
    value === undefined || value === null ? '' : String(value),
  );

export const exportRowSchema = z.object({
  meter_id: exportCell,
  customer_id: exportCell,
  reading_value: exportCell,
  reading_date: exportCell,
  unit: exportCell,
  source_system: exportCell,
});

/**
 * Body of `POST /api/export`.
 */
export const exportRequestSchema = z.object({
  rows: z.array(exportRowSchema),
  format: z.string().trim().min(1, 'format is required'),
});

export type ExportRequestDto = z.infer<typeof exportRequestSchema>;
