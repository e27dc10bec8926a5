import { Router, Request, Response } from 'express';
import { ZodError } from 'zod';
import type { LabelSheet } from '../models/label-sheet.model';
import { CONTENT_TYPES } from '../models/drawing.model';
import { labelsRequestSchema, type LabelsRequest } from '../validators/labels.validator';
import { getDefaultLabelSheet, getLabelSheet } from '../services/label-sheet.service';
import { normalizeLabels, resolveLabelInput } from '../services/normalize.service';
import { renderLabels } from '../services/render.service';
import { exportDrawing } from '../services/export.service';
import { savePreview } from '../services/preview.service';
import { LabelError } from '../utils/errors';
import { logger } from '../utils/logger';

const router = Router();

function resolveSheet(sheet: LabelsRequest['sheet']): LabelSheet | undefined {
  if (sheet === undefined) return getDefaultLabelSheet();
  if (typeof sheet === 'string') return getLabelSheet(sheet);
  return { ...sheet, builtIn: false };
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof LabelError) {
    const status = error.code === 'EXPORT_UNAVAILABLE' ? 503 : 400;
    res.status(status).json({ success: false, code: error.code, error: error.message });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({ success: false, error: 'Invalid request', issues: error.issues });
    return;
  }

  logger.error({ error }, 'Label rendering failed');
  const msg = error instanceof Error ? error.message : String(error);
  res.status(500).json({ success: false, error: msg });
}

/**
 * POST /api/labels
 *
 * Body:
 *   labels: { "row,col": text } | text[][] | text[]
 *   orderBy: "row" (default) | "col"   (flat lists only)
 *   sheet: sheet ID or full layout (optional)
 *   format: "pdf" (default) | "svg" | "png"
 *   action: "download" (default) | "preview"
 *   options: render options (optional)
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    const parsed = labelsRequestSchema.parse(req.body);

    const sheet = resolveSheet(parsed.sheet);
    if (!sheet) {
      return res.status(400).json({ success: false, error: `Unknown label sheet: "${String(parsed.sheet)}"` });
    }

    const grid = normalizeLabels(resolveLabelInput(parsed.labels), parsed.orderBy, sheet);
    const drawing = renderLabels(grid, parsed.options, sheet);
    const bytes = await exportDrawing(drawing, parsed.format);

    if (parsed.action === 'download') {
      res.setHeader('Content-Type', CONTENT_TYPES[parsed.format]);
      res.setHeader('Content-Disposition', `attachment; filename="labels.${parsed.format}"`);
      return res.send(bytes);
    }

    const previewId = savePreview(bytes, parsed.format);
    res.json({
      success: true,
      action: 'preview',
      previewId,
      previewUrl: `/api/preview/${previewId}`,
      labels: grid.size,
    });
  } catch (error) {
    sendError(res, error);
  }
});

export default router;
