import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const commaList = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const items = value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item !== '');
    return items.length > 0 ? items : undefined;
  }
  return value;
};

export const DEFAULT_TTS_MODEL = 'aura-2-thalia-en';
export const DEFAULT_TRANSCRIBE_MODEL = 'gemini-2.0-flash-lite';
export const DEFAULT_ALLOWED_AUDIO_MIME_TYPES = ['audio/wav', 'audio/x-wav', 'audio/mpeg'];

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(6500)),
  HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('0.0.0.0')),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  AUDIO_STORAGE_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('static')),
  DEEPGRAM_API_KEY: z.string().min(1),
  DEEPGRAM_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url().default('https://api.deepgram.com'),
  ),
  TTS_DEFAULT_MODEL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/)
      .default(DEFAULT_TTS_MODEL),
  ),
  TTS_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000),
  ),
  GEMINI_API_KEY: z.string().min(1),
  TRANSCRIBE_MODEL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default(DEFAULT_TRANSCRIBE_MODEL),
  ),
  TRANSCRIBE_ALLOWED_MIME_TYPES: z.preprocess(
    commaList,
    z.array(z.string().min(1)).default(DEFAULT_ALLOWED_AUDIO_MIME_TYPES),
  ),
  TRANSCRIBE_MAX_UPLOAD_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(25 * 1024 * 1024),
  ),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
