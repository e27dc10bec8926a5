import fs from 'fs';
import path from 'path';
import type { PDFDocument, PDFFont } from 'pdf-lib';
import { config } from '../config';
import type { LabelDrawing, TextElement } from '../models/drawing.model';
import { logger } from '../utils/logger';
import { ExportUnavailableError, UnencodableTextError } from '../utils/errors';
import { pxToPt } from '../utils/unit-converter';
import { placeLines } from './render.service';

type PdfLib = typeof import('pdf-lib');
type Fontkit = Parameters<PDFDocument['registerFontkit']>[0];
export type FontFace = 'helvetica' | 'times' | 'courier';

export const UNICODE_FONT_REGULAR = 'NotoSans-Regular.ttf';
export const UNICODE_FONT_BOLD = 'NotoSans-Bold.ttf';

/** CSS family names that map onto the PDF standard fonts */
const FAMILY_FACES: Readonly<Record<string, FontFace>> = {
  helvetica: 'helvetica',
  arial: 'helvetica',
  'sans-serif': 'helvetica',
  times: 'times',
  'times new roman': 'times',
  serif: 'times',
  courier: 'courier',
  'courier new': 'courier',
  monospace: 'courier',
};

async function loadPdfLib(): Promise<PdfLib> {
  try {
    return await import('pdf-lib');
  } catch (error) {
    throw new ExportUnavailableError('pdf', 'pdf-lib', error);
  }
}

export function isBoldWeight(weight: string): boolean {
  const w = weight.trim().toLowerCase();
  if (w === 'bold' || w === 'bolder') return true;
  const numeric = Number(w);
  return Number.isFinite(numeric) && numeric >= 600;
}

/** First family in a CSS font-family list that has a standard PDF face */
export function resolveFontFace(family: string): FontFace | undefined {
  for (const part of family.split(',')) {
    const face = FAMILY_FACES[part.trim().replace(/^["']|["']$/g, '').toLowerCase()];
    if (face) return face;
  }
  return undefined;
}

function standardFontName(lib: PdfLib, face: FontFace, bold: boolean) {
  const { StandardFonts } = lib;
  switch (face) {
    case 'helvetica':
      return bold ? StandardFonts.HelveticaBold : StandardFonts.Helvetica;
    case 'times':
      return bold ? StandardFonts.TimesRomanBold : StandardFonts.TimesRoman;
    case 'courier':
      return bold ? StandardFonts.CourierBold : StandardFonts.Courier;
  }
}

async function loadFontkit(): Promise<Fontkit> {
  try {
    const mod = await import('@pdf-lib/fontkit');
    return mod.default;
  } catch (error) {
    throw new ExportUnavailableError('pdf', '@pdf-lib/fontkit', error);
  }
}

// Standard fonts throw on characters outside WinAnsi
function canEncode(font: PDFFont, text: string): boolean {
  try {
    font.encodeText(text);
    return true;
  } catch {
    return false;
  }
}

function unicodeFontFile(bold: boolean): string | undefined {
  const preferred = path.join(config.fontDir, bold ? UNICODE_FONT_BOLD : UNICODE_FONT_REGULAR);
  if (fs.existsSync(preferred)) return preferred;
  const regular = path.join(config.fontDir, UNICODE_FONT_REGULAR);
  return fs.existsSync(regular) ? regular : undefined;
}

/**
 * Fonts for one document. Each family/weight pair is resolved once, and the
 * Unicode TTF from the font dir is embedded only when a line needs it.
 */
function createFontCache(lib: PdfLib, pdfDoc: PDFDocument) {
  const standardFonts = new Map<string, PDFFont>();
  const unicodeFonts = new Map<boolean, PDFFont | undefined>();

  async function standardFont(text: TextElement): Promise<PDFFont> {
    const bold = isBoldWeight(text.fontWeight);
    const key = `${text.fontFamily}:${bold}`;
    const cached = standardFonts.get(key);
    if (cached) return cached;

    let face = resolveFontFace(text.fontFamily);
    if (!face) {
      logger.warn({ fontFamily: text.fontFamily }, 'No standard PDF font for family, using Helvetica');
      face = 'helvetica';
    }
    const font = await pdfDoc.embedFont(standardFontName(lib, face, bold));
    standardFonts.set(key, font);
    return font;
  }

  async function unicodeFont(bold: boolean): Promise<PDFFont | undefined> {
    if (unicodeFonts.has(bold)) return unicodeFonts.get(bold);

    let font: PDFFont | undefined;
    const file = unicodeFontFile(bold);
    if (file) {
      pdfDoc.registerFontkit(await loadFontkit());
      try {
        font = await pdfDoc.embedFont(fs.readFileSync(file), { subset: true });
      } catch (error) {
        logger.warn({ error, file }, 'Failed to embed Unicode font');
      }
    }
    unicodeFonts.set(bold, font);
    return font;
  }

  return async (text: TextElement, line: string): Promise<PDFFont> => {
    const standard = await standardFont(text);
    if (canEncode(standard, line)) return standard;

    const bold = isBoldWeight(text.fontWeight);
    const fallback = await unicodeFont(bold);
    if (fallback && canEncode(fallback, line)) return fallback;
    throw new UnencodableTextError(line, path.join(config.fontDir, UNICODE_FONT_REGULAR));
  };
}

/**
 * Convert a drawing to a one-page PDF the size of the drawing's page.
 *
 * Drawing px are 1/96 inch; PDF points are 1/72 inch, with y measured from the bottom.
 */
export async function drawingToPdf(drawing: LabelDrawing): Promise<Buffer> {
  const lib = await loadPdfLib();
  const ink = lib.rgb(0, 0, 0);

  const pdfDoc = await lib.PDFDocument.create();
  const page = pdfDoc.addPage([pxToPt(drawing.width), pxToPt(drawing.height)]);
  const pageHeight = page.getHeight();
  const fontFor = createFontCache(lib, pdfDoc);

  for (const el of drawing.elements) {
    if (el.kind === 'circle') {
      page.drawCircle({
        x: pxToPt(el.cx),
        y: pageHeight - pxToPt(el.cy),
        size: pxToPt(el.r),
        borderWidth: pxToPt(el.strokeWidth),
        borderColor: ink,
      });
      continue;
    }

    const size = pxToPt(el.fontSize);

    for (const line of placeLines(el)) {
      if (line.text === '') continue;
      const font = await fontFor(el, line.text);
      // Baseline half an ascent below the line's middle approximates dominant-baseline: middle
      const halfAscent = font.heightAtSize(size, { descender: false }) / 2;
      const width = font.widthOfTextAtSize(line.text, size);
      page.drawText(line.text, {
        x: pxToPt(line.x) - width / 2,
        y: pageHeight - pxToPt(line.y) - halfAscent,
        size,
        font,
        color: ink,
      });
    }
  }

  const pdfBytes = await pdfDoc.save();
  logger.debug({ elements: drawing.elements.length, bytes: pdfBytes.length }, 'Label PDF generated');
  return Buffer.from(pdfBytes);
}
