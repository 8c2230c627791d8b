export interface STTRequest {
  audio: Buffer;
  mimeType: string;
}

export interface STTResult {
  text: string;
}

export interface TranscriptionOutcome {
  transcription: string;
  /** Seconds spent waiting on the provider. */
  timeTakenSeconds: number;
}
