export interface AudioStoreOptions {
  directory: string;
  /** Age after which an abandoned temp file is swept. */
  staleTempMs?: number;
}

export interface StoredAudio {
  fileName: string;
  localPath: string;
  bytes: number;
}
