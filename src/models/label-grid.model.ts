/** Grid position written as "row,col"; row 0 is the bottom printed row */
export type GridKey = `${number},${number}`;

/** Label text by grid position; text may contain "\n" line breaks */
export type LabelGrid = ReadonlyMap<GridKey, string>;

export type OrderBy = 'row' | 'col';

export const ORDER_BY_VALUES: readonly OrderBy[] = ['row', 'col'];

/** Labels keyed by "row,col" */
export interface PositionLabels {
  readonly kind: 'positions';
  readonly labels: Readonly<Record<string, string>>;
}

/** Labels as rows, row 0 first */
export interface RowLabels {
  readonly kind: 'rows';
  readonly rows: readonly (readonly string[])[];
}

/** Labels as one sequence, placed in row-major or column-major order */
export interface FlatLabels {
  readonly kind: 'flat';
  readonly labels: readonly string[];
}

export type LabelInput = PositionLabels | RowLabels | FlatLabels;

export function gridKey(row: number, col: number): GridKey {
  return `${row},${col}`;
}
