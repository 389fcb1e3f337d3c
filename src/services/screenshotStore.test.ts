import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { accountSlug, ScreenshotStore } from './screenshotStore';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), 'renewal-shots-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('accountSlug', () => {
  it('collapses anything unsafe into underscores', () => {
    expect(accountSlug('Main NYT (Ann)')).toBe('Main_NYT_Ann');
    expect(accountSlug('  ***  ')).toBe('account');
  });
});

describe('ScreenshotStore', () => {
  it('numbers screenshots inside a per-attempt directory', async () => {
    const store = new ScreenshotStore(root, 3);

    const shots = await store.beginAttempt('Main NYT', new Date('2025-09-10T12:00:00Z'));
    await shots.save('Authenticating library', new Uint8Array([1, 2]));
    await shots.save('Classifying', new Uint8Array([3]));

    expect(shots.directory).toBe(path.join(root, 'Main_NYT_20250910_120000'));
    expect((await readdir(shots.directory)).sort()).toEqual(['01_Authenticating_library.png', '02_Classifying.png']);
    expect(shots.paths()).toHaveLength(2);
  });

  it('keeps only the newest attempts for each account', async () => {
    const store = new ScreenshotStore(root, 2);

    await store.beginAttempt('Main NYT', new Date('2025-09-01T00:00:00Z'));
    await store.beginAttempt('Other', new Date('2025-09-01T00:00:00Z'));
    await store.beginAttempt('Main NYT', new Date('2025-09-02T00:00:00Z'));
    await store.beginAttempt('Main NYT', new Date('2025-09-03T00:00:00Z'));

    expect((await readdir(root)).sort()).toEqual([
      'Main_NYT_20250902_000000',
      'Main_NYT_20250903_000000',
      'Other_20250901_000000',
    ]);
  });
});
