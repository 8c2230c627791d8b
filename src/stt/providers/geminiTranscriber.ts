import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import type { TranscriptionProvider } from '../provider';
import type { STTRequest, STTResult } from '../types';
import { TRANSCRIPTION_PROMPT } from '../prompt';

/** The slice of the Gemini SDK this provider calls. */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface GeminiTranscriberOptions {
  model: string;
  apiKey?: string;
  client?: GenerateContentClient;
  prompt?: string;
}

export class GeminiTranscriber implements TranscriptionProvider {
  public readonly id = 'gemini';
  private readonly model: string;
  private readonly prompt: string;
  private readonly client: GenerateContentClient;

  constructor(options: GeminiTranscriberOptions) {
    this.model = options.model;
    this.prompt = options.prompt ?? TRANSCRIPTION_PROMPT;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new GoogleGenAI({ apiKey: options.apiKey }).models;
    } else {
      throw new Error('GeminiTranscriber requires an apiKey or a client');
    }
  }

  public async transcribe(request: STTRequest): Promise<STTResult> {
    try {
      const response = await this.client.generateContent({
        model: this.model,
        contents: [
          { inlineData: { mimeType: request.mimeType, data: request.audio.toString('base64') } },
          this.prompt,
        ],
        config: { temperature: 0 },
      });
      return { text: response.text ?? '' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Transcription failed: ${message}`);
    }
  }
}
