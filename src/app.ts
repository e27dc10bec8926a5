import express from 'express';
import cors from 'cors';
import { config } from './config';
import sheetsRoutes from './routes/sheets.routes';
import labelsRoutes from './routes/labels.routes';
import previewRoutes from './routes/preview.routes';

/** Build the HTTP app; the caller decides when and where it listens */
export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // API Routes
  app.use('/api/sheets', sheetsRoutes);
  app.use('/api/labels', labelsRoutes);
  app.use('/api/preview', previewRoutes);

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      success: true,
      service: 'round-labels',
      version: config.version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
