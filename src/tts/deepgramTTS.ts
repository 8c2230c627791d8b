import { log } from '../log';
import type { SynthesisProvider, TTSRequest, TTSResult } from './types';

export interface DeepgramTtsOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const DEFAULT_BASE_URL = 'https://api.deepgram.com';
const DEFAULT_TIMEOUT_MS = 30000;
const ERROR_PREVIEW_CHARS = 500;

function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object') {
      const candidates: unknown[] = [
        'err_msg' in parsed ? parsed.err_msg : undefined,
        'message' in parsed ? parsed.message : undefined,
        'error' in parsed ? parsed.error : undefined,
      ];
      for (const value of candidates) {
        if (typeof value === 'string' && value.trim() !== '') {
          return value;
        }
      }
    }
  } catch {
    // not JSON, fall back to the raw body
  }
  return body.length > ERROR_PREVIEW_CHARS ? `${body.slice(0, ERROR_PREVIEW_CHARS)}...` : body;
}

export class DeepgramTtsProvider implements SynthesisProvider {
  public readonly id = 'deepgram';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: DeepgramTtsOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  public buildUrl(model: string): string {
    return `${this.baseUrl}/v1/speak?model=${encodeURIComponent(model)}`;
  }

  public async synthesize(request: TTSRequest): Promise<TTSResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.buildUrl(request.model), {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({ text: request.text }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        const message = extractErrorMessage(body);
        log.error(
          { event: 'deepgram_tts_error', status: response.status, model: request.model, body_preview: message },
          'deepgram tts error',
        );
        throw new Error(`deepgram tts error ${response.status}: ${message}`);
      }

      const arrayBuffer = await response.arrayBuffer();
      return {
        audio: Buffer.from(arrayBuffer),
        contentType: response.headers.get('content-type') ?? 'audio/mpeg',
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`deepgram tts timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
