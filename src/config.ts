import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

dotenv.config();

// Project root, both from src/ (tests, ts sources) and dist/src/ (compiled)
const baseDir = fs.existsSync(path.join(__dirname, '..', 'package.json'))
  ? path.join(__dirname, '..')
  : path.join(__dirname, '..', '..');

const dataDir = process.env.DATA_DIR || path.join(baseDir, 'data');

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(baseDir, 'package.json'), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // no package.json next to the build output
  }
  return '0.0.0';
}

export const config = {
  port: parseInt(process.env.PORT || '39600', 10),
  host: process.env.HOST || '127.0.0.1',
  logLevel: process.env.LOG_LEVEL || 'info',
  defaultSheetId: process.env.DEFAULT_LABEL_SHEET || 'flexilabels-260-a4',
  dataDir,
  outputDir: process.env.OUTPUT_DIR || path.join(dataDir, 'output'),
  sheetsFile: path.join(dataDir, 'label-sheets.json'),
  fontDir: process.env.FONT_DIR || path.join(dataDir, 'fonts'),
  baseDir,
  version: readVersion(),
} as const;
