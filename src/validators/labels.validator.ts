import { z } from 'zod';
import { labelSheetSchema } from './sheet.validator';

export const renderOptionsSchema = z.object({
  showCircles: z.boolean().optional(),
  fontSize: z.number().positive().optional(),
  dxTextEm: z.number().optional(),
  dyTextEm: z.number().optional(),
  lineHeight: z.number().positive().optional(),
  fontFamily: z.string().min(1).optional(),
  fontWeight: z.string().min(1).optional(),
  circleStrokeWidth: z.number().nonnegative().optional(),
});

export const labelsRequestSchema = z.object({
  /** Position-keyed object, list of rows, or flat list; shape is resolved by the normalizer */
  labels: z.unknown(),
  /** Only for flat lists; checked by the normalizer so a bad value reports INVALID_OPTION */
  orderBy: z.string().optional(),
  /** Sheet id, or a full sheet layout; default sheet when omitted */
  sheet: z.union([z.string().min(1), labelSheetSchema]).optional(),
  format: z.enum(['pdf', 'svg', 'png']).default('pdf'),
  action: z.enum(['download', 'preview']).default('download'),
  options: renderOptionsSchema.default({}),
});

export type LabelsRequest = z.infer<typeof labelsRequestSchema>;
