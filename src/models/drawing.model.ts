export interface CircleElement {
  readonly kind: 'circle';
  readonly row: number;
  readonly col: number;
  readonly cx: number;
  readonly cy: number;
  readonly r: number;
  readonly strokeWidth: number;
}

/**
 * A block of lines centered on (x, y).
 * dxEm/dyEm shift the first line, in multiples of fontSize; each later line sits
 * lineHeight em below the previous one.
 */
export interface TextElement {
  readonly kind: 'text';
  readonly row: number;
  readonly col: number;
  readonly x: number;
  readonly y: number;
  readonly lines: readonly string[];
  readonly dxEm: number;
  readonly dyEm: number;
  readonly fontSize: number;
  readonly fontFamily: string;
  readonly fontWeight: string;
  readonly lineHeight: number;
}

export type DrawingElement = CircleElement | TextElement;

/** Vector drawing of one label sheet, page size in px */
export interface LabelDrawing {
  readonly width: number;
  readonly height: number;
  readonly elements: readonly DrawingElement[];
}

/** Color of circles and text */
export const INK_COLOR = '#000000';

export type ExportFormat = 'pdf' | 'svg' | 'png';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['pdf', 'svg', 'png'];

export const CONTENT_TYPES: Readonly<Record<ExportFormat, string>> = {
  pdf: 'application/pdf',
  svg: 'image/svg+xml',
  png: 'image/png',
};
