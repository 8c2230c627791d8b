import { SingleFlight } from '../limits/singleFlight';
import { log } from '../log';
import { incCacheLookup, incStageError, startStageTimer } from '../metrics';
import type { AudioStore } from '../storage/audioStore';
import { cacheFileName, computeCacheKey } from './cacheKey';
import type { ResolvedAudio, SynthesisProvider } from './types';

export interface AudioCacheOptions {
  store: AudioStore;
  provider: SynthesisProvider;
}

type GenerationOutcome = 'generated' | 'present';

/**
 * Content-addressed cache of synthesized audio.
 *
 * An entry is created once, when synthesis for its (model, text) first
 * succeeds, and is never rewritten or removed. Concurrent misses on the same
 * key share one provider call.
 */
export class AudioCache {
  private readonly store: AudioStore;
  private readonly provider: SynthesisProvider;
  private readonly flights = new SingleFlight<GenerationOutcome>();

  constructor(options: AudioCacheOptions) {
    this.store = options.store;
    this.provider = options.provider;
  }

  public async resolve(text: string, model: string): Promise<ResolvedAudio> {
    const key = computeCacheKey(text, model);
    const fileName = cacheFileName(key);
    const localPath = this.store.pathFor(fileName);

    if (await this.store.exists(fileName)) {
      incCacheLookup('hit');
      return { key, fileName, localPath, cached: true };
    }

    const flight = this.flights.run(key, () => this.generate(key, fileName, text, model));
    incCacheLookup(flight.shared ? 'joined' : 'miss');

    const outcome = await flight.promise;
    return { key, fileName, localPath, cached: outcome === 'present' };
  }

  private async generate(
    key: string,
    fileName: string,
    text: string,
    model: string,
  ): Promise<GenerationOutcome> {
    // A flight for this key may have published the file after our first check.
    if (await this.store.exists(fileName)) {
      return 'present';
    }

    const endTimer = startStageTimer('tts_synthesize');
    const startedAt = Date.now();
    try {
      const result = await this.provider.synthesize({ text, model });
      if (result.audio.length === 0) {
        throw new Error(`${this.provider.id} returned empty audio`);
      }

      const stored = await this.store.writeAtomic(fileName, result.audio);
      log.info(
        {
          event: 'tts_synthesized',
          provider: this.provider.id,
          model,
          cache_key: key,
          audio_bytes: stored.bytes,
          duration_ms: Date.now() - startedAt,
        },
        'tts synthesized',
      );
      return 'generated';
    } catch (error) {
      incStageError('tts_synthesize');
      log.error(
        { err: error, provider: this.provider.id, model, cache_key: key },
        'tts generation failed',
      );
      throw error;
    } finally {
      endTimer();
    }
  }
}
