import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import createError from 'http-errors';
import pinoHttp from 'pino-http';
import { isProduction } from './config.js';
import { logger } from './logger.js';
import { logAudit } from './services/auditService.js';
import patientRoutes from './routes/patientRoutes.js';
import triageRoutes from './routes/triageRoutes.js';

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const httpErr = createError.isHttpError(err) ? err : createError(500, err instanceof Error ? err.message : String(err));
  if (httpErr.status >= 500) {
    req.log.error({ err }, 'request failed');
    logAudit({ type: 'error', payload: { path: req.path, message: httpErr.message } });
  }
  const expose = httpErr.expose || !isProduction();
  res.status(httpErr.status).json({ error: expose ? httpErr.message : 'internal_error' });
};

export function createApp() {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(pinoHttp({ logger, autoLogging: { ignore: (req) => req.url === '/health' } }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'triage-rules-api' });
  });

  app.use(triageRoutes);
  app.use(patientRoutes);

  app.use((req, _res, next) => next(createError(404, `No route for ${req.method} ${req.path}`)));
  app.use(errorHandler);
  return app;
}
