/**
 * Layout of one commercial sheet of round sticker labels.
 *
 * Lengths are SVG pixels at 96 PPI (A4 is 794 x 1123 px).
 */
export interface LabelSheet {
  readonly id: string;
  readonly name: string;
  /** Horizontal distance between the centers of neighbouring labels */
  readonly xMultiplier: number;
  /** Vertical distance between the centers of neighbouring labels */
  readonly yMultiplier: number;
  /** x of the center of the leftmost column (column 0) */
  readonly xOffset: number;
  /** y of the center of the top row (row numRows - 1); rows below it have larger y */
  readonly yOffset: number;
  /** Radius of the circle marking a sticker's boundary */
  readonly radius: number;
  readonly defaultFontSize: number;
  readonly pageWidthPx: number;
  readonly pageHeightPx: number;
  readonly numRows: number;
  readonly numCols: number;
  readonly builtIn: boolean;
}

export type LabelSheetParams = Omit<LabelSheet, 'builtIn'>;

/** 260 round 10 mm labels on A4, 20 rows x 13 columns (Flexi Labels / OnlineLabels EU30059) */
export const FLEXILABELS_260_A4: LabelSheet = {
  id: 'flexilabels-260-a4',
  name: 'Flexi Labels 260 per A4 sheet (10 mm round)',
  xMultiplier: 49.16,
  yMultiplier: 49.16,
  xOffset: 102.0,
  yOffset: 94.5,
  radius: 19.0,
  defaultFontSize: 8.0,
  pageWidthPx: 794,
  pageHeightPx: 1123,
  numRows: 20,
  numCols: 13,
  builtIn: true,
};

/** Built-in label sheets */
export const BUILT_IN_LABEL_SHEETS: readonly LabelSheet[] = [FLEXILABELS_260_A4];
