import pino from 'pino';
import { config, isTest } from './config.js';

export const logger = pino({
  name: 'triage-rules-api',
  level: config.logLevel,
  enabled: !isTest(),
});
