import { Router, Request, Response } from 'express';
import {
  getAllLabelSheets,
  getLabelSheet,
  addCustomLabelSheet,
  deleteCustomLabelSheet,
} from '../services/label-sheet.service';
import { labelSheetSchema } from '../validators/sheet.validator';

const router = Router();

/** GET /api/sheets - List all label sheets */
router.get('/', (_req: Request, res: Response) => {
  res.json({ success: true, data: getAllLabelSheets() });
});

/** GET /api/sheets/:id - Get a label sheet by ID */
router.get('/:id', (req: Request, res: Response) => {
  const sheet = getLabelSheet(String(req.params.id));
  if (!sheet) {
    return res.status(404).json({ success: false, error: 'Label sheet not found' });
  }
  res.json({ success: true, data: sheet });
});

/** POST /api/sheets - Add a custom label sheet */
router.post('/', (req: Request, res: Response) => {
  try {
    const params = labelSheetSchema.parse(req.body);
    const sheet = addCustomLabelSheet(params);
    res.status(201).json({ success: true, data: sheet });
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    res.status(400).json({ success: false, error: msg });
  }
});

/** DELETE /api/sheets/:id - Delete a custom label sheet */
router.delete('/:id', (req: Request, res: Response) => {
  const deleted = deleteCustomLabelSheet(String(req.params.id));
  if (!deleted) {
    return res.status(404).json({ success: false, error: 'Custom label sheet not found' });
  }
  res.json({ success: true });
});

export default router;
