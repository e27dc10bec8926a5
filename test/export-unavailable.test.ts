/**
 * Export fails cleanly when the PDF or PNG library cannot be loaded.
 */

import { describe, test, expect, vi, afterEach } from 'vitest';
import type { LabelDrawing } from '../src/models/drawing.model';

const drawing: LabelDrawing = { width: 100, height: 100, elements: [] };

describe('missing export libraries', () => {
  afterEach(() => {
    vi.doUnmock('pdf-lib');
    vi.doUnmock('@napi-rs/canvas');
    vi.resetModules();
  });

  test('PDF export reports EXPORT_UNAVAILABLE', async () => {
    vi.resetModules();
    vi.doMock('pdf-lib', () => {
      throw new Error('Cannot find module');
    });
    const { drawingToPdf } = await import('../src/services/pdf.service');

    await expect(drawingToPdf(drawing)).rejects.toMatchObject({
      name: 'ExportUnavailableError',
      code: 'EXPORT_UNAVAILABLE',
      format: 'pdf',
      dependency: 'pdf-lib',
    });
  });

  test('PNG export reports EXPORT_UNAVAILABLE', async () => {
    vi.resetModules();
    vi.doMock('@napi-rs/canvas', () => {
      throw new Error('Cannot find module');
    });
    const { drawingToPng } = await import('../src/services/png.service');

    await expect(drawingToPng(drawing)).rejects.toMatchObject({
      name: 'ExportUnavailableError',
      code: 'EXPORT_UNAVAILABLE',
      format: 'png',
      dependency: '@napi-rs/canvas',
    });
  });
});
