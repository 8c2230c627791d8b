export class UnsupportedMediaTypeError extends Error {
  public readonly status = 400;

  constructor(public readonly mimeType: string) {
    super('Only .wav and .mp3 files are supported.');
    this.name = 'UnsupportedMediaTypeError';
  }
}

// Strips parameters ("audio/wav; codecs=1") and case.
export function normalizeMimeType(value: string): string {
  return value.split(';')[0].trim().toLowerCase();
}

export function isAllowedAudioMimeType(mimeType: string, allowList: readonly string[]): boolean {
  const normalized = normalizeMimeType(mimeType);
  return allowList.some((allowed) => normalizeMimeType(allowed) === normalized);
}

export function assertAllowedAudioMimeType(mimeType: string, allowList: readonly string[]): void {
  if (!isAllowedAudioMimeType(mimeType, allowList)) {
    throw new UnsupportedMediaTypeError(mimeType);
  }
}
