import { Router, type Request } from 'express';
import { z } from 'zod';
import { log } from '../log';
import type { AudioCache } from '../tts/audioCache';
import { isValidModelId, isWellFormedText } from '../tts/cacheKey';
import { errorMessage, requestIdOf, type ErrorBody } from './errors';

export interface TtsRouterOptions {
  audioCache: AudioCache;
  defaultModel: string;
  /** Absolute origin used for links; the request's own origin when unset. */
  publicBaseUrl?: string;
  staticPath?: string;
}

export interface TtsResponseBody {
  link: string;
  cached: boolean;
}

const TtsRequestSchema = z.object({
  text: z.string().min(1).refine(isWellFormedText, { message: 'text contains unpaired UTF-16 surrogates' }),
  model: z
    .string()
    .min(1)
    .refine(isValidModelId, { message: 'model may only contain letters, digits, ".", "_" and "-"' })
    .optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

export function buildArtifactLink(
  req: Request,
  fileName: string,
  options: Pick<TtsRouterOptions, 'publicBaseUrl' | 'staticPath'>,
): string {
  const origin = options.publicBaseUrl
    ? options.publicBaseUrl.replace(/\/$/, '')
    : `${req.protocol}://${req.get('host') ?? 'localhost'}`;
  const staticPath = (options.staticPath ?? '/static').replace(/\/$/, '');
  return `${origin}${staticPath}/${encodeURIComponent(fileName)}`;
}

export function createTtsRouter(options: TtsRouterOptions): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const parsed = TtsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorBody = { detail: formatIssues(parsed.error) };
      res.status(422).json(body);
      return;
    }

    const { text } = parsed.data;
    const model = parsed.data.model ?? options.defaultModel;

    try {
      const resolved = await options.audioCache.resolve(text, model);
      const body: TtsResponseBody = {
        link: buildArtifactLink(req, resolved.fileName, options),
        cached: resolved.cached,
      };
      res.status(200).json(body);
    } catch (error) {
      log.error({ err: error, model, requestId: requestIdOf(res.locals) }, 'tts request failed');
      const body: ErrorBody = { detail: errorMessage(error) };
      res.status(500).json(body);
    }
  });

  return router;
}
