import { z } from 'zod';
import { mappingDeclarationSchema } from '../mapping/mapping.resolver';

/**
 * Body of `POST /api/convert`: one uploaded file, base64 encoded.
 */
export const convertRequestSchema = z.object({
  filename: z.string().trim().min(1, 'filename is required'),
  content: z
    .string()
    .regex(/^[A-Za-z0-9+/=_\-\s]*$/, 'content must be base64 encoded'),
  source_name: z.string().optional(),
  /** Used only when it names all four required columns. */
  mapping: mappingDeclarationSchema.nullish(),
});

export type ConvertRequestDto = z.infer<typeof convertRequestSchema>;
