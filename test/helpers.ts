import type { LabelSheet } from '../src/models/label-sheet.model';
import type { GridKey, LabelGrid } from '../src/models/label-grid.model';

/** 2 x 2 grid with round numbers; label (0,0) is centered at (100, 100) */
export const SMALL_SHEET: LabelSheet = {
  id: 'test-2x2',
  name: 'Test 2x2',
  xMultiplier: 50,
  yMultiplier: 40,
  xOffset: 100,
  yOffset: 60,
  radius: 15,
  defaultFontSize: 10,
  pageWidthPx: 300,
  pageHeightPx: 200,
  numRows: 2,
  numCols: 2,
  builtIn: false,
};

export function gridOf(...entries: [GridKey, string][]): LabelGrid {
  return new Map(entries);
}
