import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { log } from '../log';
import { UnsupportedMediaTypeError } from '../stt/mimeTypes';
import type { TranscriptionProvider } from '../stt/provider';
import { transcribeAudio } from '../stt/transcribe';
import { errorMessage, requestIdOf, type ErrorBody } from './errors';

export interface TranscribeRouterOptions {
  provider: TranscriptionProvider;
  allowedMimeTypes: readonly string[];
  maxUploadBytes: number;
}

export interface TranscribeResponseBody {
  transcription: string;
  time_taken: number;
}

export function createTranscribeRouter(options: TranscribeRouterOptions): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 },
  });

  router.post('/', upload.single('file'), async (req, res) => {
    const file = req.file;
    if (!file) {
      const body: ErrorBody = { detail: 'file is required' };
      res.status(422).json(body);
      return;
    }

    try {
      const outcome = await transcribeAudio(options.provider, {
        audio: file.buffer,
        mimeType: file.mimetype,
        allowedMimeTypes: options.allowedMimeTypes,
      });
      const body: TranscribeResponseBody = {
        transcription: outcome.transcription,
        time_taken: outcome.timeTakenSeconds,
      };
      res.status(200).json(body);
    } catch (error) {
      if (error instanceof UnsupportedMediaTypeError) {
        log.warn(
          { event: 'stt_unsupported_media_type', mime_type: error.mimeType, requestId: requestIdOf(res.locals) },
          'transcription rejected',
        );
        const body: ErrorBody = { detail: error.message };
        res.status(error.status).json(body);
        return;
      }

      const body: ErrorBody = { detail: `Error during transcription: ${errorMessage(error)}` };
      res.status(500).json(body);
    }
  });

  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 422;
      const body: ErrorBody = { detail: err.message };
      res.status(status).json(body);
      return;
    }
    next(err);
  });

  return router;
}
