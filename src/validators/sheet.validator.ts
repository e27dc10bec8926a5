import { z } from 'zod';

// A sheet is rasterized at page size for PNG, so keep pages and grids to printable sizes
export const MAX_PAGE_PX = 5000;
export const MAX_GRID_SIDE = 200;

export const labelSheetSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9-]+$/, 'ID must be lowercase alphanumeric with hyphens'),
  name: z.string().min(1),
  xMultiplier: z.number().positive(),
  yMultiplier: z.number().positive(),
  xOffset: z.number(),
  yOffset: z.number(),
  radius: z.number().positive(),
  defaultFontSize: z.number().positive(),
  pageWidthPx: z.number().int().positive().max(MAX_PAGE_PX),
  pageHeightPx: z.number().int().positive().max(MAX_PAGE_PX),
  numRows: z.number().int().positive().max(MAX_GRID_SIDE),
  numCols: z.number().int().positive().max(MAX_GRID_SIDE),
});

export const labelSheetListSchema = z.array(labelSheetSchema);

