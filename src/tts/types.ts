export interface TTSRequest {
  text: string;
  model: string;
}

export interface TTSResult {
  audio: Buffer;
  contentType: string;
}

export interface SynthesisProvider {
  id: string;
  synthesize(request: TTSRequest): Promise<TTSResult>;
}

export interface ResolvedAudio {
  key: string;
  fileName: string;
  localPath: string;
  cached: boolean;
}
