import fs from 'fs';
import os from 'os';
import path from 'path';

// Keep logs quiet and every written file (custom sheets, previews) out of the repo
process.env.LOG_LEVEL = 'silent';
process.env.DATA_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'round-labels-data-'));
// No Unicode font unless a test adds one
process.env.FONT_DIR = path.join(process.env.DATA_DIR, 'fonts');
