import crypto from 'crypto';

export const CACHE_AUDIO_EXTENSION = 'mp3';

// Voice model ids never contain ':', so `${model}:${text}` splits unambiguously.
const MODEL_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export function isValidModelId(model: string): boolean {
  return MODEL_ID_PATTERN.test(model);
}

// UTF-8 encoding replaces a lone surrogate with U+FFFD, which would alias distinct texts.
const LONE_SURROGATE_PATTERN = /\p{Surrogate}/u;

export function isWellFormedText(text: string): boolean {
  return !LONE_SURROGATE_PATTERN.test(text);
}

export function computeCacheKey(text: string, model: string): string {
  if (!isValidModelId(model)) {
    throw new Error(`invalid voice model id: ${JSON.stringify(model)}`);
  }
  if (!isWellFormedText(text)) {
    throw new Error('text contains unpaired UTF-16 surrogates');
  }
  return crypto.createHash('sha256').update(`${model}:${text}`, 'utf8').digest('hex');
}

export function cacheFileName(key: string, extension: string = CACHE_AUDIO_EXTENSION): string {
  return `${key}.${extension}`;
}
