import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { assertAllowedAudioMimeType, normalizeMimeType } from './mimeTypes';
import type { TranscriptionProvider } from './provider';
import type { TranscriptionOutcome } from './types';

export interface TranscribeAudioInput {
  audio: Buffer;
  mimeType: string;
  allowedMimeTypes: readonly string[];
}

/**
 * Validates the media type, then forwards the audio to the provider. Nothing
 * reaches the provider when the type is outside the allow-list.
 */
export async function transcribeAudio(
  provider: TranscriptionProvider,
  input: TranscribeAudioInput,
): Promise<TranscriptionOutcome> {
  assertAllowedAudioMimeType(input.mimeType, input.allowedMimeTypes);
  const mimeType = normalizeMimeType(input.mimeType);

  const endTimer = startStageTimer('stt_transcribe');
  const startedAt = process.hrtime.bigint();
  try {
    const result = await provider.transcribe({ audio: input.audio, mimeType });
    const timeTakenSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
    log.info(
      {
        event: 'stt_transcribed',
        provider: provider.id,
        mime_type: mimeType,
        audio_bytes: input.audio.length,
        transcript_chars: result.text.length,
        time_taken_s: timeTakenSeconds,
      },
      'stt transcribed',
    );
    return { transcription: result.text, timeTakenSeconds };
  } catch (error) {
    incStageError('stt_transcribe');
    log.error({ err: error, provider: provider.id, mime_type: mimeType }, 'stt transcription failed');
    throw error;
  } finally {
    endTimer();
  }
}
