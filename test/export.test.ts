/**
 * Tests for src/services/export.service.ts and the PDF / PNG exporters.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PDFDocument } from 'pdf-lib';
import { resolveExportFormat, writeLabels, exportDrawing } from '../src/services/export.service';
import { isBoldWeight, resolveFontFace } from '../src/services/pdf.service';
import { drawingToSvg } from '../src/services/svg.service';
import { renderLabels } from '../src/services/render.service';
import { flatLabels, normalizeLabels, positionLabels } from '../src/services/normalize.service';
import {
  MissingExtensionError,
  TooManyItemsError,
  UnencodableTextError,
  UnsupportedFormatError,
} from '../src/utils/errors';
import { logger } from '../src/utils/logger';
import { SMALL_SHEET, gridOf } from './helpers';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('resolveExportFormat', () => {
  test('reads the extension case-insensitively', () => {
    expect(resolveExportFormat('labels.pdf')).toBe('pdf');
    expect(resolveExportFormat('LABELS.PDF')).toBe('pdf');
    expect(resolveExportFormat('out/labels.Svg')).toBe('svg');
    expect(resolveExportFormat('labels.png')).toBe('png');
  });

  test('rejects an unsupported extension, naming it', () => {
    let caught: unknown;
    try {
      resolveExportFormat('out.txt');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnsupportedFormatError);
    expect(caught).toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
      extension: 'txt',
      message: 'Unsupported file extension "txt"; must end in .pdf, .svg, .png',
    });
  });

  test('rejects a filename without an extension', () => {
    expect(() => resolveExportFormat('labels')).toThrow(
      new MissingExtensionError('labels', ['pdf', 'svg', 'png']),
    );
  });

  test('a dot in a directory name is not an extension', () => {
    expect(() => resolveExportFormat('run.2024/labels')).toThrow(MissingExtensionError);
  });
});

describe('PDF fonts', () => {
  test('bold weights', () => {
    expect(isBoldWeight('bold')).toBe(true);
    expect(isBoldWeight('bolder')).toBe(true);
    expect(isBoldWeight('700')).toBe(true);
    expect(isBoldWeight('normal')).toBe(false);
    expect(isBoldWeight('400')).toBe(false);
  });

  test('families map to standard faces', () => {
    expect(resolveFontFace('Helvetica')).toBe('helvetica');
    expect(resolveFontFace('"Times New Roman", serif')).toBe('times');
    expect(resolveFontFace('Fira Code, monospace')).toBe('courier');
    expect(resolveFontFace('Comic Sans MS')).toBeUndefined();
  });
});

describe('writeLabels', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'round-labels-export-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('writes SVG and returns the drawing', async () => {
    const file = path.join(tmpDir, 'labels.svg');
    const drawing = await writeLabels(file, flatLabels(['A', 'B', 'C']), { sheet: SMALL_SHEET });

    expect(drawing.elements).toHaveLength(6);
    expect(fs.readFileSync(file, 'utf-8')).toBe(drawingToSvg(drawing));
  });

  test('creates missing parent directories', async () => {
    const file = path.join(tmpDir, 'nested', 'dir', 'labels.svg');
    await writeLabels(file, flatLabels(['A']), { sheet: SMALL_SHEET });
    expect(fs.existsSync(file)).toBe(true);
  });

  test('passes orderBy through to the normalizer', async () => {
    const file = path.join(tmpDir, 'labels.svg');
    const drawing = await writeLabels(file, flatLabels(['A', 'B', 'C']), {
      sheet: SMALL_SHEET,
      orderBy: 'col',
      showCircles: false,
    });
    expect(drawing.elements.map((el) => [el.row, el.col])).toEqual([[0, 0], [0, 1], [1, 0]]);
  });

  test('writes nothing for an unsupported extension', async () => {
    const file = path.join(tmpDir, 'out.txt');
    await expect(writeLabels(file, flatLabels(['A']), { sheet: SMALL_SHEET })).rejects.toThrow(UnsupportedFormatError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  test('writes nothing when the labels do not fit', async () => {
    const file = path.join(tmpDir, 'labels.pdf');
    await expect(
      writeLabels(file, flatLabels(['a', 'b', 'c', 'd', 'e']), { sheet: SMALL_SHEET }),
    ).rejects.toThrow(TooManyItemsError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  test('writes a one-page A4 PDF on the default sheet with no intermediate file', async () => {
    const file = path.join(tmpDir, 'labels.pdf');
    const drawing = await writeLabels(
      file,
      positionLabels({ '0,0': '10 nM\nsample1\n22-03-09', '19,12': 'corner' }),
      { fontWeight: 'bold' },
    );

    expect(drawing.width).toBe(794);
    expect(drawing.height).toBe(1123);
    expect(fs.readdirSync(tmpDir)).toEqual(['labels.pdf']);

    const bytes = fs.readFileSync(file);
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');

    const pdf = await PDFDocument.load(bytes);
    expect(pdf.getPageCount()).toBe(1);
    const { width, height } = pdf.getPage(0).getSize();
    expect(width).toBeCloseTo(595.5, 2);
    expect(height).toBeCloseTo(842.25, 2);
  });

  test('falls back to Helvetica for an unknown font family, warning once', async () => {
    const warn = vi.spyOn(logger, 'warn');
    try {
      const grid = gridOf(['0,0', 'x'], ['0,1', 'y'], ['1,0', 'z']);
      const drawing = renderLabels(grid, { fontFamily: 'Comic Sans MS' }, SMALL_SHEET);
      const bytes = await exportDrawing(drawing, 'pdf');

      expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        { fontFamily: 'Comic Sans MS' },
        'No standard PDF font for family, using Helvetica',
      );
    } finally {
      warn.mockRestore();
    }
  });

  test('accented Latin text is drawn with the standard fonts', async () => {
    const drawing = renderLabels(gridOf(['0,0', 'café 5 °C']), {}, SMALL_SHEET);
    const bytes = await exportDrawing(drawing, 'pdf');
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  test('text outside the standard fonts without a Unicode font is a label error', async () => {
    const drawing = renderLabels(normalizeLabels(flatLabels(['10 μM\nsample']), undefined, SMALL_SHEET), {}, SMALL_SHEET);

    let caught: unknown;
    try {
      await exportDrawing(drawing, 'pdf');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnencodableTextError);
    expect(caught).toMatchObject({ code: 'UNENCODABLE_TEXT', text: '10 μM' });
  });

  test('writes nothing when PDF text cannot be drawn', async () => {
    const file = path.join(tmpDir, 'labels.pdf');
    await expect(writeLabels(file, flatLabels(['α']), { sheet: SMALL_SHEET })).rejects.toThrow(UnencodableTextError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  test('writes a PNG the size of the page', async () => {
    const file = path.join(tmpDir, 'labels.png');
    await writeLabels(file, flatLabels(['A', 'B\nC']), { sheet: SMALL_SHEET });

    const bytes = fs.readFileSync(file);
    expect([...bytes.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
    // IHDR: width and height follow the 8-byte signature and the chunk length/type
    expect(bytes.readUInt32BE(16)).toBe(300);
    expect(bytes.readUInt32BE(20)).toBe(200);
  });
});
