import { env } from './env';
import { log } from './log';
import { buildServer } from './server';
import { AudioStore } from './storage/audioStore';
import { GeminiTranscriber } from './stt/providers/geminiTranscriber';
import { AudioCache } from './tts/audioCache';
import { DeepgramTtsProvider } from './tts/deepgramTTS';

async function main(): Promise<void> {
  const audioStore = new AudioStore({ directory: env.AUDIO_STORAGE_DIR });
  await audioStore.ensureDirectory();
  await audioStore.sweepTempFiles();

  const synthesizer = new DeepgramTtsProvider({
    apiKey: env.DEEPGRAM_API_KEY,
    baseUrl: env.DEEPGRAM_BASE_URL,
    timeoutMs: env.TTS_TIMEOUT_MS,
  });
  const transcriber = new GeminiTranscriber({
    apiKey: env.GEMINI_API_KEY,
    model: env.TRANSCRIBE_MODEL,
  });

  const { server } = buildServer({
    audioCache: new AudioCache({ store: audioStore, provider: synthesizer }),
    audioStore,
    transcriber,
    defaultModel: env.TTS_DEFAULT_MODEL,
    publicBaseUrl: env.PUBLIC_BASE_URL,
    allowedMimeTypes: env.TRANSCRIBE_ALLOWED_MIME_TYPES,
    maxUploadBytes: env.TRANSCRIBE_MAX_UPLOAD_BYTES,
  });

  server.listen(env.PORT, env.HOST, () => {
    log.info(
      { port: env.PORT, host: env.HOST, audio_dir: audioStore.directory, default_model: env.TTS_DEFAULT_MODEL },
      'server listening',
    );
  });
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'startup failed');
  process.exit(1);
});
