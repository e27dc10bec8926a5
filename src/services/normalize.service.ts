import type { LabelSheet } from '../models/label-sheet.model';
import {
  type FlatLabels,
  type GridKey,
  type LabelGrid,
  type LabelInput,
  type OrderBy,
  type PositionLabels,
  type RowLabels,
  ORDER_BY_VALUES,
  gridKey,
} from '../models/label-grid.model';
import {
  InvalidInputError,
  InvalidOptionError,
  OutOfBoundsError,
  TooManyItemsError,
} from '../utils/errors';

export type GridSize = Pick<LabelSheet, 'numRows' | 'numCols'>;

// Canonical integers only, so two distinct keys never name the same position
const GRID_KEY_PATTERN = /^(0|-?[1-9]\d*),(0|-?[1-9]\d*)$/;

export function positionLabels(labels: Readonly<Record<string, string>>): PositionLabels {
  return { kind: 'positions', labels };
}

export function rowLabels(rows: readonly (readonly string[])[]): RowLabels {
  return { kind: 'rows', rows };
}

export function flatLabels(labels: readonly string[]): FlatLabels {
  return { kind: 'flat', labels };
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Decide which label shape an untyped value (a JSON body, say) has:
 * an object keyed "row,col", a list of rows, or a flat list.
 */
export function resolveLabelInput(raw: unknown): LabelInput {
  if (Array.isArray(raw)) {
    const items: unknown[] = raw;
    if (items.length > 0 && Array.isArray(items[0])) {
      const rows: string[][] = [];
      items.forEach((row, index) => {
        if (!isStringArray(row)) {
          throw new InvalidInputError(`labels row #${index} must be a list of strings but is a ${describeType(row)}`);
        }
        rows.push(row);
      });
      return rowLabels(rows);
    }
    const labels: string[] = [];
    items.forEach((label, index) => {
      if (typeof label !== 'string') {
        throw new InvalidInputError(`labels[${index}] must be a string but is a ${describeType(label)}`);
      }
      labels.push(label);
    });
    return flatLabels(labels);
  }

  if (typeof raw === 'object' && raw !== null) {
    const entries: [string, unknown][] = Object.entries(raw);
    const labels: Record<string, string> = {};
    for (const [key, text] of entries) {
      if (typeof text !== 'string') {
        throw new InvalidInputError(`label at "${key}" must be a string but is a ${describeType(text)}`);
      }
      labels[key] = text;
    }
    return positionLabels(labels);
  }

  throw new InvalidInputError(`labels must be a list or an object keyed by "row,col" but is a ${describeType(raw)}`);
}

function parseGridKey(key: string): [number, number] {
  const match = GRID_KEY_PATTERN.exec(key);
  if (!match) {
    throw new InvalidInputError(`label position "${key}" must be written "row,col" with integer row and column, no spaces or leading zeros`);
  }
  return [Number(match[1]), Number(match[2])];
}

function rejectOrderBy(orderBy: string | undefined, kind: string): void {
  if (orderBy !== undefined) {
    throw new InvalidOptionError(
      `orderBy is only meaningful for flat sequences, but labels are ${kind}`,
    );
  }
}

function parseOrderBy(orderBy: string | undefined): OrderBy {
  if (orderBy === undefined) return 'row';
  const match = ORDER_BY_VALUES.find((value) => value === orderBy);
  if (!match) {
    throw new InvalidOptionError(`invalid orderBy "${orderBy}"; must be "row" or "col" if specified`);
  }
  return match;
}

function normalizePositions(labels: Readonly<Record<string, string>>, size: GridSize): LabelGrid {
  const grid = new Map<GridKey, string>();
  for (const [key, text] of Object.entries(labels)) {
    const [row, col] = parseGridKey(key);
    if (row < 0 || row >= size.numRows) {
      throw new OutOfBoundsError('row', row, size.numRows);
    }
    if (col < 0 || col >= size.numCols) {
      throw new OutOfBoundsError('column', col, size.numCols);
    }
    grid.set(gridKey(row, col), text);
  }
  return grid;
}

function checkRows(rows: readonly (readonly string[])[], size: GridSize): void {
  if (rows.length > size.numRows) {
    throw new TooManyItemsError(`labels has ${rows.length} rows; max is ${size.numRows}`);
  }
  rows.forEach((row, index) => {
    if (row.length > size.numCols) {
      throw new TooManyItemsError(`labels row #${index} has ${row.length} columns; max is ${size.numCols}`);
    }
  });
}

/** Fill row 0 left to right, then row 1, ... */
export function reshapeByRow(labels: readonly string[], numCols: number): string[][] {
  const rows: string[][] = [];
  labels.forEach((label, index) => {
    if (index % numCols === 0) rows.push([]);
    rows[rows.length - 1].push(label);
  });
  return rows;
}

/**
 * Fill column 0 from row 0 upward, then column 1, ...
 * A final partial column leaves the rows above it one label shorter.
 */
export function reshapeByCol(labels: readonly string[], numRows: number): string[][] {
  const rows: string[][] = [];
  labels.forEach((label, index) => {
    const row = index % numRows;
    if (index < numRows) rows.push([]);
    rows[row].push(label);
  });
  return rows;
}

function gridFromRows(rows: readonly (readonly string[])[]): LabelGrid {
  const grid = new Map<GridKey, string>();
  rows.forEach((row, rowIndex) => {
    row.forEach((text, colIndex) => grid.set(gridKey(rowIndex, colIndex), text));
  });
  return grid;
}

/**
 * Convert any label shape into text by grid position.
 *
 * Nothing is truncated: labels that do not fit the sheet raise an error.
 * Blank labels are kept; the renderer skips them.
 */
export function normalizeLabels(input: LabelInput, orderBy: string | undefined, sheet: GridSize): LabelGrid {
  switch (input.kind) {
    case 'positions':
      rejectOrderBy(orderBy, 'keyed by position');
      return normalizePositions(input.labels, sheet);

    case 'rows':
      rejectOrderBy(orderBy, 'a list of rows');
      checkRows(input.rows, sheet);
      return gridFromRows(input.rows);

    case 'flat': {
      const order = parseOrderBy(orderBy);
      const capacity = sheet.numRows * sheet.numCols;
      if (input.labels.length > capacity) {
        throw new TooManyItemsError(
          `labels is too long, length ${input.labels.length}; limit it to at most ${capacity} strings`,
        );
      }
      const rows = order === 'row'
        ? reshapeByRow(input.labels, sheet.numCols)
        : reshapeByCol(input.labels, sheet.numRows);
      return gridFromRows(rows);
    }
  }
}
