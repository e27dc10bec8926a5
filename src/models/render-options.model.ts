export interface RenderOptions {
  /** Draw each sticker's boundary; handy for checking fit, usually off for the final print */
  readonly showCircles: boolean;
  /** px */
  readonly fontSize: number;
  readonly dxTextEm: number;
  readonly dyTextEm: number;
  /** Multiple of the standard line height; below 1 packs lines closer */
  readonly lineHeight: number;
  /** CSS font family */
  readonly fontFamily: string;
  /** CSS font weight */
  readonly fontWeight: string;
  readonly circleStrokeWidth: number;
}

export const DEFAULT_RENDER_OPTIONS: Omit<RenderOptions, 'fontSize'> = {
  showCircles: true,
  dxTextEm: 0,
  dyTextEm: 0,
  lineHeight: 1.0,
  fontFamily: 'Helvetica',
  fontWeight: 'normal',
  circleStrokeWidth: 1.33,
};
