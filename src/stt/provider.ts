import type { STTRequest, STTResult } from './types';

export interface TranscriptionProvider {
  id: string;
  transcribe(request: STTRequest): Promise<STTResult>;
}
