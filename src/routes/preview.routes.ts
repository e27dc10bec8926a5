import { Router, Request, Response } from 'express';
import { CONTENT_TYPES } from '../models/drawing.model';
import { findPreview, isValidPreviewId } from '../services/preview.service';

const router = Router();

/** GET /api/preview/:id - Serve a stored preview (PDF, SVG or PNG) */
router.get('/:id', (req: Request, res: Response) => {
  const previewId = String(req.params.id);

  // Sanitize ID to prevent path traversal
  if (!isValidPreviewId(previewId)) {
    return res.status(400).json({ success: false, error: 'Invalid preview ID' });
  }

  const preview = findPreview(previewId);
  if (!preview) {
    return res.status(404).json({ success: false, error: 'Preview not found or expired' });
  }

  res.setHeader('Content-Type', CONTENT_TYPES[preview.format]);
  res.sendFile(preview.filePath);
});

export default router;
