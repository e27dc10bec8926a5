import fs from 'fs';
import path from 'path';
import type { LabelSheet } from '../models/label-sheet.model';
import type { LabelInput } from '../models/label-grid.model';
import type { RenderOptions } from '../models/render-options.model';
import { type ExportFormat, type LabelDrawing, EXPORT_FORMATS } from '../models/drawing.model';
import { MissingExtensionError, UnsupportedFormatError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getDefaultLabelSheet } from './label-sheet.service';
import { normalizeLabels } from './normalize.service';
import { renderLabels } from './render.service';
import { drawingToSvg } from './svg.service';
import { drawingToPdf } from './pdf.service';
import { drawingToPng } from './png.service';

export interface WriteLabelsOptions extends Partial<RenderOptions> {
  /** Placement order for flat label lists; row-major when unset */
  readonly orderBy?: string;
  /** Sheet layout; the configured default sheet when unset */
  readonly sheet?: LabelSheet;
}

/** Output format from a filename's extension, case-insensitive */
export function resolveExportFormat(filename: string): ExportFormat {
  const base = path.basename(filename);
  const dot = base.lastIndexOf('.');
  if (dot === -1) {
    throw new MissingExtensionError(filename, EXPORT_FORMATS);
  }

  const extension = base.slice(dot + 1);
  const format = EXPORT_FORMATS.find((f) => f === extension.toLowerCase());
  if (!format) {
    throw new UnsupportedFormatError(extension, EXPORT_FORMATS);
  }
  return format;
}

/** Encode a drawing in the given format */
export async function exportDrawing(drawing: LabelDrawing, format: ExportFormat): Promise<Buffer> {
  switch (format) {
    case 'svg':
      return Buffer.from(drawingToSvg(drawing), 'utf-8');
    case 'pdf':
      return drawingToPdf(drawing);
    case 'png':
      return drawingToPng(drawing);
  }
}

/**
 * Lay out labels on a sheet and write them to `filename` (.pdf, .svg or .png).
 *
 * The filename is checked before anything is drawn, so a bad extension writes
 * nothing. Returns the drawing for previewing.
 */
export async function writeLabels(
  filename: string,
  labels: LabelInput,
  options: WriteLabelsOptions = {}
): Promise<LabelDrawing> {
  const format = resolveExportFormat(filename);
  const { orderBy, sheet = getDefaultLabelSheet(), ...renderOptions } = options;

  const grid = normalizeLabels(labels, orderBy, sheet);
  const drawing = renderLabels(grid, renderOptions, sheet);
  const bytes = await exportDrawing(drawing, format);

  fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  fs.writeFileSync(filename, bytes);
  logger.info({ filename, format, sheet: sheet.id, labels: grid.size }, 'Labels written');

  return drawing;
}
