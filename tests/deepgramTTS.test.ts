import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('synthesize posts the text to the speak endpoint for the model', async () => {
  const { DeepgramTtsProvider } = await import('../src/tts/deepgramTTS');
  const originalFetch = globalThis.fetch;

  const calls: Array<{ url: string; headers: Headers; body: string }> = [];
  globalThis.fetch = async (url, options) => {
    calls.push({
      url: String(url),
      headers: new Headers(options?.headers),
      body: String(options?.body),
    });
    return new Response(new Blob([Buffer.from([0xff, 0xf3, 0x01])]), {
      status: 200,
      headers: { 'content-type': 'audio/mpeg' },
    });
  };

  try {
    const provider = new DeepgramTtsProvider({ apiKey: 'test-secret' });
    const result = await provider.synthesize({ text: 'Hello world', model: 'aura-2-thalia-en' });

    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'https://api.deepgram.com/v1/speak?model=aura-2-thalia-en');
    assert.equal(calls[0].headers.get('authorization'), 'Token test-secret');
    assert.equal(calls[0].headers.get('content-type'), 'application/json');
    assert.deepEqual(JSON.parse(calls[0].body), { text: 'Hello world' });
    assert.deepEqual(result.audio, Buffer.from([0xff, 0xf3, 0x01]));
    assert.equal(result.contentType, 'audio/mpeg');
  } finally {
    globalThis.fetch = originalFetch;
  }
});

test('synthesize surfaces the provider error message', async () => {
  const { DeepgramTtsProvider } = await import('../src/tts/deepgramTTS');
  const originalFetch = globalThis.fetch;

  globalThis.fetch = async () =>
    new Response(JSON.stringify({ err_code: 'INVALID_MODEL', err_msg: 'No such model' }), {
      status: 400,
      headers: { 'content-type': 'application/json' },
    });

  try {
    const provider = new DeepgramTtsProvider({ apiKey: 'test-secret' });
    await assert.rejects(
      provider.synthesize({ text: 'Hello', model: 'aura-9' }),
      (error: unknown) => error instanceof Error && error.message === 'deepgram tts error 400: No such model',
    );
  } finally {
    globalThis.fetch = originalFetch;
  }
});

test('synthesize aborts a call that exceeds the timeout', async () => {
  const { DeepgramTtsProvider } = await import('../src/tts/deepgramTTS');
  const originalFetch = globalThis.fetch;

  globalThis.fetch = (_url, options) =>
    new Promise<Response>((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    });

  try {
    const provider = new DeepgramTtsProvider({ apiKey: 'test-secret', timeoutMs: 20 });
    await assert.rejects(
      provider.synthesize({ text: 'Hello', model: 'aura-2-thalia-en' }),
      /deepgram tts timed out after 20ms/,
    );
  } finally {
    globalThis.fetch = originalFetch;
  }
});

test('buildUrl trims a trailing slash from the base url', async () => {
  const { DeepgramTtsProvider } = await import('../src/tts/deepgramTTS');
  const provider = new DeepgramTtsProvider({ apiKey: 'test-secret', baseUrl: 'http://localhost:9999/' });

  assert.equal(provider.buildUrl('aura-2-thalia-en'), 'http://localhost:9999/v1/speak?model=aura-2-thalia-en');
});
