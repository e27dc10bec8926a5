export type { LabelSheet, LabelSheetParams } from './models/label-sheet.model';
export { BUILT_IN_LABEL_SHEETS, FLEXILABELS_260_A4 } from './models/label-sheet.model';
export type { GridKey, LabelGrid, LabelInput, OrderBy, PositionLabels, RowLabels, FlatLabels } from './models/label-grid.model';
export { gridKey } from './models/label-grid.model';
export type { CircleElement, TextElement, DrawingElement, LabelDrawing, ExportFormat } from './models/drawing.model';
export type { RenderOptions } from './models/render-options.model';
export { DEFAULT_RENDER_OPTIONS } from './models/render-options.model';
export {
  normalizeLabels,
  resolveLabelInput,
  positionLabels,
  rowLabels,
  flatLabels,
} from './services/normalize.service';
export { renderLabels, resolveRenderOptions, labelCenter } from './services/render.service';
export { drawingToSvg } from './services/svg.service';
export { drawingToPdf } from './services/pdf.service';
export { drawingToPng } from './services/png.service';
export { writeLabels, exportDrawing, resolveExportFormat, type WriteLabelsOptions } from './services/export.service';
export {
  initLabelSheets,
  getAllLabelSheets,
  getLabelSheet,
  getDefaultLabelSheet,
  addCustomLabelSheet,
  deleteCustomLabelSheet,
} from './services/label-sheet.service';
export * from './utils/errors';
