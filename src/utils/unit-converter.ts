/** 1 inch = 72 PDF points */
const PT_PER_INCH = 72;
/** 1 inch = 96 CSS/SVG pixels */
const PX_PER_INCH = 96;

/** SVG px -> PDF points */
export function pxToPt(px: number): number {
  return (px / PX_PER_INCH) * PT_PER_INCH;
}

/** Drop floating-point noise before writing a number into markup */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}
