import { randomUUID } from 'crypto';
import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { healthRouter } from './routes/health';
import { errorMessage, requestIdOf, type ErrorBody } from './routes/errors';
import { createTranscribeRouter } from './routes/transcribe';
import { createTtsRouter } from './routes/tts';
import type { AudioStore } from './storage/audioStore';
import type { TranscriptionProvider } from './stt/provider';
import type { AudioCache } from './tts/audioCache';

export const STATIC_PATH = '/static';
// Bodies over this size are refused with 413 before validation.
const TTS_BODY_LIMIT = '1mb';

export interface ServerDependencies {
  audioCache: AudioCache;
  audioStore: AudioStore;
  transcriber: TranscriptionProvider;
  defaultModel: string;
  publicBaseUrl?: string;
  allowedMimeTypes: readonly string[];
  maxUploadBytes: number;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

// express.json reports a body it cannot decode this way.
function isBodyParseError(err: unknown): boolean {
  return Boolean(err && typeof err === 'object' && 'type' in err && err.type === 'entity.parse.failed');
}

function clientErrorStatus(err: unknown): number | undefined {
  if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    const body: ErrorBody = { detail: `invalid JSON body: ${errorMessage(err)}` };
    res.status(422).json(body);
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    const body: ErrorBody = { detail: errorMessage(err) };
    res.status(status).json(body);
    return;
  }

  log.error({ err, requestId: requestIdOf(res.locals) }, 'unhandled error');
  const body: ErrorBody = { detail: 'internal_server_error' };
  res.status(500).json(body);
}

export function buildServer(deps: ServerDependencies): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: true, credentials: true }));
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json({ limit: TTS_BODY_LIMIT }));

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });

  app.use(
    '/tts',
    createTtsRouter({
      audioCache: deps.audioCache,
      defaultModel: deps.defaultModel,
      publicBaseUrl: deps.publicBaseUrl,
      staticPath: STATIC_PATH,
    }),
  );
  app.use(
    '/transcribe',
    createTranscribeRouter({
      provider: deps.transcriber,
      allowedMimeTypes: deps.allowedMimeTypes,
      maxUploadBytes: deps.maxUploadBytes,
    }),
  );

  // Cache entries never change once published.
  app.use(
    STATIC_PATH,
    express.static(deps.audioStore.directory, {
      dotfiles: 'ignore',
      index: false,
      immutable: true,
      maxAge: '365d',
    }),
  );

  app.use(errorHandler);

  const server = http.createServer(app);

  return { app, server };
}
