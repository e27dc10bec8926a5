import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'round-labels',
  level: config.logLevel,
});
