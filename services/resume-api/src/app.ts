/**
 * Resume API
 *
 * POST /api/resume/upload - Parses an uploaded PDF resume into structured fields
 */

import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  ResumeParserError,
  UnsupportedFileTypeError,
  type Config,
  type ErrorEnvelope,
  type ResumeUploadResponse,
} from '@resume-parser/shared';
import type { ResumePipeline } from './lib/pipeline';

export interface AppDependencies {
  pipeline: Pick<ResumePipeline, 'parse'>;
  config: Pick<Config, 'maxUploadBytes' | 'generationProvider' | 'generationModel'>;
}

const SUPPORTED_EXTENSION = '.pdf';
const UPLOAD_FIELD = 'file';
const RAW_CONTENT_TYPES = ['application/pdf', 'application/octet-stream'];

interface UploadedDocument {
  filename: string | undefined;
  bytes: Buffer | undefined;
}

function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

function correlationIdOf(res: Response): string {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : ulid();
}

function uploadFilename(req: Request): string | undefined {
  const header = req.header('x-filename');
  if (header) return header;
  const query = req.query.filename;
  return typeof query === 'string' && query !== '' ? query : undefined;
}

/**
 * The multipart `file` part, or a raw body named by X-Filename / ?filename=
 */
function uploadedDocument(req: Request): UploadedDocument {
  if (req.file) {
    return { filename: req.file.originalname || undefined, bytes: req.file.buffer };
  }
  return {
    filename: uploadFilename(req),
    bytes: Buffer.isBuffer(req.body) ? req.body : undefined,
  };
}

/**
 * multipart/form-data goes through multer, anything else through the raw parser
 */
function uploadBody(maxUploadBytes: number): RequestHandler {
  const multipart = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single(UPLOAD_FIELD);
  const raw = express.raw({ type: RAW_CONTENT_TYPES, limit: maxUploadBytes });

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.is('multipart/form-data')) {
      multipart(req, res, next);
    } else {
      raw(req, res, next);
    }
  };
}

function assertSupportedFilename(filename: string): void {
  if (!filename.toLowerCase().endsWith(SUPPORTED_EXTENSION)) {
    throw new UnsupportedFileTypeError('Only PDF files are supported at this stage.');
  }
}

function statusForError(error: ResumeParserError): number {
  switch (error.code) {
    case 'unsupported_file_type':
      return 400;
    case 'invalid_document':
      return 422;
    default:
      return 500;
  }
}

function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function createApp(deps: AppDependencies): express.Express {
  const { pipeline, config } = deps;
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);
    res.locals.correlationId = correlationId;

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

      // Body parsers run callbacks outside the request context
      logger.info('Request completed', {
        correlationId: correlationIdOf(res),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Resume parser backend is running' });
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'resume-api',
      generation_provider: config.generationProvider,
      generation_model: config.generationModel,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  const resumeRouter = express.Router();

  const upload = uploadBody(config.maxUploadBytes);

  /**
   * POST /api/resume/upload
   * Body: multipart/form-data with a `file` part, or raw PDF bytes named by
   * the X-Filename header or ?filename=
   */
  resumeRouter.post('/upload', upload, async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const { filename, bytes } = uploadedDocument(req);

    if (!filename) {
      res
        .status(400)
        .json(
          errorEnvelope(
            'invalid_request',
            'A file is required (multipart field "file", or a raw body with an X-Filename header or filename query parameter)',
            correlationId
          )
        );
      return;
    }

    try {
      assertSupportedFilename(filename);

      if (!bytes || bytes.length === 0) {
        res
          .status(400)
          .json(
            errorEnvelope(
              'invalid_request',
              'Request body must contain the PDF bytes (Content-Type: application/pdf)',
              correlationId
            )
          );
        return;
      }

      const outcome = await runWithContextAsync({ correlationId, filename }, () => {
        logger.info('Parsing uploaded resume', { size_bytes: bytes.length });
        return pipeline.parse(bytes);
      });

      const response: ResumeUploadResponse = {
        filename,
        parsed_data: outcome.result,
      };
      res.json(response);
    } catch (error) {
      if (error instanceof ResumeParserError) {
        const status = statusForError(error);
        if (status >= 500) {
          logger.error('Resume upload failed', error, { correlationId, filename });
        } else {
          logger.warn('Resume upload rejected', {
            correlationId,
            filename,
            code: error.code,
            error: error.message,
          });
        }
        res.status(status).json(errorEnvelope(error.code, error.message, correlationId));
        return;
      }

      logger.error('Resume upload failed', error, { correlationId, filename });
      res
        .status(500)
        .json(
          errorEnvelope(
            'internal_error',
            error instanceof Error ? error.message : 'Unknown error',
            correlationId
          )
        );
    }
  });

  app.use('/api/resume', resumeRouter);

  // Upload body errors (payload too large, malformed multipart, aborted uploads)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const correlationId = correlationIdOf(res);

    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      const code = status === 413 ? 'payload_too_large' : 'invalid_request';
      logger.warn('Upload rejected', { correlationId, type: err.code, field: err.field, status });
      res.status(status).json(errorEnvelope(code, err.message, correlationId));
      return;
    }

    if (isBodyParserError(err)) {
      const code = err.type === 'entity.too.large' ? 'payload_too_large' : 'invalid_request';
      logger.warn('Request body rejected', { correlationId, type: err.type, status: err.status });
      res.status(err.status).json(errorEnvelope(code, err.message, correlationId));
      return;
    }

    logger.error('Request failed', err, { correlationId });
    res
      .status(500)
      .json(
        errorEnvelope(
          'internal_error',
          err instanceof Error ? err.message : 'Unknown error',
          correlationId
        )
      );
  });

  return app;
}
