import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records TRUE milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_cache_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// Provider round trips (tts_synthesize, stt_transcribe)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Provider stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of provider errors by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const ttsCacheLookupsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tts_cache_lookups_total`,
  help: 'TTS cache lookups by outcome (hit, miss, joined an in-flight generation)',
  labelNames: ['result'] as const,
  registers: [register],
});

export type CacheLookupResult = 'hit' | 'miss' | 'joined';

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    route && typeof route === 'object' && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      const durationMs = nsToMs(nowNs() - start);
      httpRequestDurationMs.observe(
        {
          method: req.method,
          route: getRouteLabel(req),
          code: String(res.statusCode),
        },
        durationMs,
      );
    } catch {
      // never break requests due to metrics
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();

  return () => {
    try {
      stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
    } catch {
      // swallow
    }
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incCacheLookup(result: CacheLookupResult): void {
  ttsCacheLookupsTotal.inc({ result });
}
