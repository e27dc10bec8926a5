import { type CircleElement, type LabelDrawing, type TextElement, INK_COLOR } from '../models/drawing.model';
import { formatNumber as n } from '../utils/unit-converter';

const XML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => XML_ESCAPES[c] ?? c);
}

function circleToSvg(circle: CircleElement): string {
  return `<circle cx="${n(circle.cx)}" cy="${n(circle.cy)}" r="${n(circle.r)}" fill="none" `
    + `stroke="${INK_COLOR}" stroke-width="${n(circle.strokeWidth)}"/>`;
}

// dx/dy apply per character, so an empty tspan would lose its line step
const EMPTY_LINE = '&#160;';

// One tspan per line: the first carries the block shift, each later one steps down a line.
function textToSvg(text: TextElement): string {
  const spans = text.lines.map((line, index) => {
    const dy = index === 0 ? text.dyEm : text.lineHeight;
    const content = line === '' ? EMPTY_LINE : escapeXml(line);
    return `<tspan x="${n(text.x)}" dx="${n(text.dxEm)}em" dy="${n(dy)}em">${content}</tspan>`;
  });
  return `<text x="${n(text.x)}" y="${n(text.y)}" font-size="${n(text.fontSize)}" `
    + `font-family="${escapeXml(text.fontFamily)}" font-weight="${escapeXml(text.fontWeight)}" `
    + `fill="${INK_COLOR}" text-anchor="middle" dominant-baseline="middle">${spans.join('')}</text>`;
}

/** Serialize a drawing as a standalone SVG document */
export function drawingToSvg(drawing: LabelDrawing): string {
  const body = drawing.elements.map((el) => (el.kind === 'circle' ? circleToSvg(el) : textToSvg(el)));
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${drawing.width}" height="${drawing.height}" `
      + `viewBox="0 0 ${drawing.width} ${drawing.height}">`,
    ...body,
    '</svg>',
    '',
  ].join('\n');
}
