import type { LabelSheet } from '../models/label-sheet.model';
import type { LabelGrid } from '../models/label-grid.model';
import type { DrawingElement, LabelDrawing, TextElement } from '../models/drawing.model';
import { type RenderOptions, DEFAULT_RENDER_OPTIONS } from '../models/render-options.model';

export interface LabelCenter {
  readonly x: number;
  readonly y: number;
}

/**
 * Page coordinates (y grows downward) of the center of the label at (row, col).
 * Row 0 is the bottom row of the grid.
 */
export function labelCenter(row: number, col: number, sheet: LabelSheet): LabelCenter {
  return {
    x: sheet.xOffset + col * sheet.xMultiplier,
    y: sheet.yOffset + (sheet.numRows - row - 1) * sheet.yMultiplier,
  };
}

/** Fill in unset options; font size defaults to the sheet's */
export function resolveRenderOptions(options: Partial<RenderOptions>, sheet: LabelSheet): RenderOptions {
  return {
    showCircles: options.showCircles ?? DEFAULT_RENDER_OPTIONS.showCircles,
    fontSize: options.fontSize ?? sheet.defaultFontSize,
    dxTextEm: options.dxTextEm ?? DEFAULT_RENDER_OPTIONS.dxTextEm,
    dyTextEm: options.dyTextEm ?? DEFAULT_RENDER_OPTIONS.dyTextEm,
    lineHeight: options.lineHeight ?? DEFAULT_RENDER_OPTIONS.lineHeight,
    fontFamily: options.fontFamily ?? DEFAULT_RENDER_OPTIONS.fontFamily,
    fontWeight: options.fontWeight ?? DEFAULT_RENDER_OPTIONS.fontWeight,
    circleStrokeWidth: options.circleStrokeWidth ?? DEFAULT_RENDER_OPTIONS.circleStrokeWidth,
  };
}

export interface PlacedLine {
  readonly text: string;
  readonly x: number;
  readonly y: number;
}

/** Center of each line of a text element, in page px */
export function placeLines(text: TextElement): PlacedLine[] {
  return text.lines.map((line, index) => ({
    text: line,
    x: text.x + text.dxEm * text.fontSize,
    y: text.y + (text.dyEm + index * text.lineHeight) * text.fontSize,
  }));
}

/** Shift of the first line that puts the middle of an n-line block on the center */
export function blockShiftEm(numLines: number, dyTextEm: number, lineHeight: number): number {
  return dyTextEm - ((numLines - 1) / 2) * lineHeight;
}

function textElement(row: number, col: number, label: string, center: LabelCenter, options: RenderOptions): TextElement {
  const lines = label.split('\n');
  return {
    kind: 'text',
    row,
    col,
    x: center.x,
    y: center.y,
    lines,
    dxEm: options.dxTextEm,
    dyEm: blockShiftEm(lines.length, options.dyTextEm, options.lineHeight),
    fontSize: options.fontSize,
    fontFamily: options.fontFamily,
    fontWeight: options.fontWeight,
    lineHeight: options.lineHeight,
  };
}

/**
 * Draw every non-blank label of the grid: an optional boundary circle and the
 * text block centered in it.
 */
export function renderLabels(grid: LabelGrid, options: Partial<RenderOptions>, sheet: LabelSheet): LabelDrawing {
  const resolved = resolveRenderOptions(options, sheet);
  const elements: DrawingElement[] = [];

  for (const [key, label] of grid) {
    if (label.trim() === '') continue;

    const [row, col] = key.split(',').map(Number);
    const center = labelCenter(row, col, sheet);

    if (resolved.showCircles) {
      elements.push({
        kind: 'circle',
        row,
        col,
        cx: center.x,
        cy: center.y,
        r: sheet.radius,
        strokeWidth: resolved.circleStrokeWidth,
      });
    }
    elements.push(textElement(row, col, label, center, resolved));
  }

  return {
    width: sheet.pageWidthPx,
    height: sheet.pageHeightPx,
    elements,
  };
}
