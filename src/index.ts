import http from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { initLabelSheets } from './services/label-sheet.service';

const app = createApp();
const server = http.createServer(app);

// Initialize services
initLabelSheets();

// Start server
server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host }, 'round-labels server started');
  logger.info(`API: http://${config.host}:${config.port}/api/health`);
});

export { app, server };
