import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import path from 'path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { deferred, FakeSynthesisProvider, makeTempDir, waitFor } from './fakes';

setTestEnv();

const HELLO_WORLD_FILE = '4cf99f7ca3e8099de6309473103bac91dd99f7e23311997d1eaf480a79db0226.mp3';

async function setup() {
  const { AudioStore } = await import('../src/storage/audioStore');
  const { AudioCache } = await import('../src/tts/audioCache');
  const dir = await makeTempDir();
  const store = new AudioStore({ directory: dir });
  const provider = new FakeSynthesisProvider();
  const cache = new AudioCache({ store, provider });
  return { dir, store, provider, cache };
}

test('first resolve synthesizes and a repeat is served from cache', async () => {
  const { dir, provider, cache } = await setup();

  const first = await cache.resolve('Hello world', 'aura-2-thalia-en');

  assert.equal(first.cached, false);
  assert.equal(first.fileName, HELLO_WORLD_FILE);
  assert.equal(first.localPath, path.join(dir, HELLO_WORLD_FILE));
  assert.deepEqual(provider.calls, [{ text: 'Hello world', model: 'aura-2-thalia-en' }]);
  assert.equal(await fs.readFile(first.localPath, 'utf8'), 'audio:aura-2-thalia-en:Hello world');

  const second = await cache.resolve('Hello world', 'aura-2-thalia-en');

  assert.equal(second.cached, true);
  assert.equal(second.localPath, first.localPath);
  assert.equal(provider.calls.length, 1);
});

test('concurrent resolves for one key call the provider once', async () => {
  const { dir, provider, cache } = await setup();
  const gate = deferred<void>();
  provider.gate = gate.promise;

  const pending = Array.from({ length: 8 }, () => cache.resolve('Same text', 'aura-2-thalia-en'));
  await waitFor(() => provider.calls.length === 1);
  // Let the remaining callers finish their existence checks and join the flight.
  await new Promise((resolve) => setTimeout(resolve, 25));

  gate.resolve();
  const results = await Promise.all(pending);

  assert.equal(provider.calls.length, 1);
  assert.equal(new Set(results.map((result) => result.localPath)).size, 1);
  assert.ok(results.every((result) => result.cached === false));
  assert.deepEqual(await fs.readdir(dir), [results[0].fileName]);
});

test('different models for the same text are separate entries', async () => {
  const { provider, cache } = await setup();

  const thalia = await cache.resolve('Hello', 'aura-2-thalia-en');
  const andromeda = await cache.resolve('Hello', 'aura-2-andromeda-en');

  assert.notEqual(thalia.fileName, andromeda.fileName);
  assert.equal(andromeda.cached, false);
  assert.equal(provider.calls.length, 2);
});

test('a provider failure leaves nothing at the target path and is retried later', async () => {
  const { dir, store, provider, cache } = await setup();
  provider.failWith = new Error('provider unavailable');

  await assert.rejects(cache.resolve('Hello world', 'aura-2-thalia-en'), /provider unavailable/);

  assert.equal(await store.exists(HELLO_WORLD_FILE), false);
  assert.deepEqual(await fs.readdir(dir), []);

  provider.failWith = null;
  const retried = await cache.resolve('Hello world', 'aura-2-thalia-en');

  assert.equal(retried.cached, false);
  assert.equal(provider.calls.length, 2);
});

test('all waiters on a failing generation receive the error', async () => {
  const { provider, cache } = await setup();
  const gate = deferred<void>();
  provider.gate = gate.promise;
  provider.failWith = new Error('quota exceeded');

  const a = cache.resolve('Hello world', 'aura-2-thalia-en');
  const b = cache.resolve('Hello world', 'aura-2-thalia-en');
  await waitFor(() => provider.calls.length === 1);
  await new Promise((resolve) => setTimeout(resolve, 25));
  gate.resolve();

  await Promise.all([assert.rejects(a, /quota exceeded/), assert.rejects(b, /quota exceeded/)]);
  assert.equal(provider.calls.length, 1);
});

test('empty provider audio is not cached', async () => {
  const { store, provider, cache } = await setup();
  provider.audio = Buffer.alloc(0);

  await assert.rejects(cache.resolve('Hello world', 'aura-2-thalia-en'), /fake returned empty audio/);
  assert.equal(await store.exists(HELLO_WORLD_FILE), false);
});

test('an artifact already on disk is served without a provider call', async () => {
  const { dir, provider, cache } = await setup();
  await fs.writeFile(path.join(dir, HELLO_WORLD_FILE), 'existing');

  const result = await cache.resolve('Hello world', 'aura-2-thalia-en');

  assert.equal(result.cached, true);
  assert.equal(provider.calls.length, 0);
  assert.equal(await fs.readFile(result.localPath, 'utf8'), 'existing');
});
