import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { logger } from '../utils/logger';
import { type ExportFormat, EXPORT_FORMATS } from '../models/drawing.model';

const PREVIEW_TTL_MS = 60 * 60 * 1000; // 1 hour

const PREVIEW_ID_PATTERN = /^[a-f0-9-]+$/;

export interface StoredPreview {
  readonly filePath: string;
  readonly format: ExportFormat;
}

function previewPath(id: string, format: ExportFormat, dir: string): string {
  return path.join(dir, `preview-${id}.${format}`);
}

export function isValidPreviewId(id: string): boolean {
  return PREVIEW_ID_PATTERN.test(id);
}

/** Store an exported file for an hour; returns its preview ID */
export function savePreview(bytes: Buffer, format: ExportFormat, dir: string = config.outputDir): string {
  const id = uuidv4();
  const filePath = previewPath(id, format, dir);

  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, bytes);
  logger.info({ id, format }, 'Preview stored');

  setTimeout(() => {
    fs.rm(filePath, { force: true }, (error) => {
      if (error) logger.warn({ error, filePath }, 'Failed to remove expired preview');
    });
  }, PREVIEW_TTL_MS).unref();

  return id;
}

export function findPreview(id: string, dir: string = config.outputDir): StoredPreview | undefined {
  if (!isValidPreviewId(id)) return undefined;

  for (const format of EXPORT_FORMATS) {
    const filePath = previewPath(id, format, dir);
    if (fs.existsSync(filePath)) return { filePath, format };
  }
  return undefined;
}
