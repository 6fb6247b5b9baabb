/**
 * Extract API
 *
 * HTTP front for the report extractor. The caller posts the raw report text;
 * the response is the row table as JSON or CSV plus the diagnostics.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getAllExtractors,
  getExtractor,
  toDelimited,
  validateExtractionResult,
  type ErrorEnvelope,
  type ExtractResponse,
  type ProfileSummary,
} from '@reportgrid/shared';

export interface AppOptions {
  maxDocumentBytes?: number;
  defaultProfile?: string;
}

type ResponseFormat = 'json' | 'csv';

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

function parseFormat(value: unknown): ResponseFormat | null {
  if (value === undefined || value === 'json') return 'json';
  if (value === 'csv') return 'csv';
  return null;
}

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

export function createApp(options: AppOptions = {}): express.Express {
  const maxDocumentBytes = options.maxDocumentBytes ?? config.maxDocumentBytes;
  const defaultProfile = options.defaultProfile ?? config.defaultProfile;

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.use(express.text({ type: 'text/*', limit: maxDocumentBytes }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extract-api',
      profiles: getAllExtractors().length,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /profiles
   * Lists the report layouts this service can extract
   */
  app.get('/profiles', (req: Request, res: Response) => {
    const profiles: ProfileSummary[] = getAllExtractors().map(extractor => ({
      name: extractor.profileName,
      description: extractor.description,
      period_type: extractor.periodType,
    }));
    res.json({ profiles });
  });

  /**
   * POST /extract?profile=<name>&format=json|csv
   * Body: the raw report as text/plain
   */
  app.post('/extract', (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const profileParam = req.query.profile;
    const profile = typeof profileParam === 'string' && profileParam !== '' ? profileParam : defaultProfile;

    const format = parseFormat(req.query.format);
    if (!format) {
      sendError(res, 400, 'invalid_request', 'format must be json or csv');
      return;
    }

    const extractor = getExtractor(profile);
    if (!extractor) {
      sendError(res, 404, 'unknown_profile', `Report profile ${profile} is not registered`);
      return;
    }

    const document: unknown = req.body;
    if (typeof document !== 'string' || document.trim() === '') {
      sendError(res, 400, 'invalid_request', 'Request body must be a non-empty text/plain report');
      return;
    }

    try {
      const result = extractor.extract(document, { correlationId });

      const validation = validateExtractionResult(result);
      if (!validation.valid) {
        logger.warn('ExtractionResult validation failed', { errors: validation.errors });
      }

      res.setHeader('X-Diagnostics-Count', String(result.diagnostics.length));

      if (format === 'csv') {
        res.type('text/csv').send(toDelimited(result.rows));
        return;
      }

      const body: ExtractResponse = {
        correlation_id: correlationId,
        profile: result.profile,
        rows: result.rows,
        diagnostics: result.diagnostics,
        stats: result.stats,
      };
      res.json(body);
    } catch (error) {
      logger.error('Extraction failed', error, { profile });
      sendError(res, 500, 'internal_error', 'Failed to extract report');
    }
  });

  // Body parser and unhandled errors
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);

    if (type === 'entity.too.large') {
      sendError(res, 413, 'payload_too_large', `Report exceeds ${maxDocumentBytes} bytes`);
      return;
    }
    if (type === 'encoding.unsupported' || type === 'charset.unsupported') {
      sendError(res, 415, 'unsupported_encoding', 'Report encoding is not supported');
      return;
    }

    logger.error('Unhandled request error', err, { path: req.path });
    sendError(res, 500, 'internal_error', 'Unexpected error');
  });

  return app;
}
