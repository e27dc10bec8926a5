import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger } from '../utils/logger';
import { type LabelSheet, type LabelSheetParams, BUILT_IN_LABEL_SHEETS, FLEXILABELS_260_A4 } from '../models/label-sheet.model';
import { labelSheetListSchema } from '../validators/sheet.validator';

let sheetsFile = config.sheetsFile;
let customSheets: LabelSheet[] = [];

/** Load custom label sheets from disk */
function loadCustomSheets(): void {
  customSheets = [];
  if (!fs.existsSync(sheetsFile)) return;

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(sheetsFile, 'utf-8'));
    customSheets = labelSheetListSchema.parse(raw).map((s) => ({ ...s, builtIn: false }));
  } catch (error) {
    logger.error({ error, file: sheetsFile }, 'Failed to load custom label sheets');
  }
}

/** Save custom label sheets to disk */
function saveCustomSheets(): void {
  fs.mkdirSync(path.dirname(sheetsFile), { recursive: true });
  const params: LabelSheetParams[] = customSheets.map(({ builtIn: _builtIn, ...rest }) => rest);
  fs.writeFileSync(sheetsFile, JSON.stringify(params, null, 2), 'utf-8');
}

/** Initialize - load custom sheets on startup */
export function initLabelSheets(file: string = config.sheetsFile): void {
  sheetsFile = file;
  loadCustomSheets();
  logger.info({ builtIn: BUILT_IN_LABEL_SHEETS.length, custom: customSheets.length }, 'Label sheets loaded');
}

/** Get all label sheets (built-in + custom) */
export function getAllLabelSheets(): LabelSheet[] {
  return [...BUILT_IN_LABEL_SHEETS, ...customSheets];
}

export function getLabelSheet(id: string): LabelSheet | undefined {
  return getAllLabelSheets().find((s) => s.id === id);
}

/** The sheet named by DEFAULT_LABEL_SHEET, or the first built-in one */
export function getDefaultLabelSheet(): LabelSheet {
  const configured = getLabelSheet(config.defaultSheetId);
  if (configured) return configured;

  logger.warn({ id: config.defaultSheetId }, 'Configured default label sheet not found, using built-in');
  return FLEXILABELS_260_A4;
}

export function addCustomLabelSheet(params: LabelSheetParams): LabelSheet {
  if (getLabelSheet(params.id)) {
    throw new Error(`Label sheet '${params.id}' already exists`);
  }

  const sheet: LabelSheet = { ...params, builtIn: false };
  customSheets = [...customSheets, sheet];
  saveCustomSheets();
  logger.info({ id: sheet.id }, 'Custom label sheet added');
  return sheet;
}

/** Delete a custom label sheet; built-in sheets cannot be deleted */
export function deleteCustomLabelSheet(id: string): boolean {
  if (!customSheets.some((s) => s.id === id)) return false;

  customSheets = customSheets.filter((s) => s.id !== id);
  saveCustomSheets();
  logger.info({ id }, 'Custom label sheet deleted');
  return true;
}
