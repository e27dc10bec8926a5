import { type LabelDrawing, INK_COLOR } from '../models/drawing.model';
import { logger } from '../utils/logger';
import { ExportUnavailableError } from '../utils/errors';
import { placeLines } from './render.service';

type CanvasLib = typeof import('@napi-rs/canvas');

async function loadCanvas(): Promise<CanvasLib> {
  try {
    return await import('@napi-rs/canvas');
  } catch (error) {
    throw new ExportUnavailableError('png', '@napi-rs/canvas', error);
  }
}

/** Rasterize a drawing at one pixel per drawing px, on a white background */
export async function drawingToPng(drawing: LabelDrawing): Promise<Buffer> {
  const { createCanvas } = await loadCanvas();

  const canvas = createCanvas(drawing.width, drawing.height);
  const ctx = canvas.getContext('2d');

  ctx.fillStyle = '#FFFFFF';
  ctx.fillRect(0, 0, drawing.width, drawing.height);
  ctx.strokeStyle = INK_COLOR;
  ctx.fillStyle = INK_COLOR;
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';

  for (const el of drawing.elements) {
    if (el.kind === 'circle') {
      ctx.lineWidth = el.strokeWidth;
      ctx.beginPath();
      ctx.arc(el.cx, el.cy, el.r, 0, Math.PI * 2);
      ctx.stroke();
      continue;
    }

    ctx.font = `${el.fontWeight} ${el.fontSize}px ${el.fontFamily}`;
    for (const line of placeLines(el)) {
      ctx.fillText(line.text, line.x, line.y);
    }
  }

  const buffer = canvas.toBuffer('image/png');
  logger.debug({ elements: drawing.elements.length, bytes: buffer.length }, 'Label PNG generated');
  return buffer;
}
