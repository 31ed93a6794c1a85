import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CrawlStateStore } from './crawl-state-store.js';
import { emptyProgress, recordOutcome } from './crawl-progress.js';
import { CheckpointError } from '../utils/errors.js';
import { makeErrorRecord, makeRecord } from './__fixtures__/records.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const TARGET = 'https://shop.example.test/str/parts';
const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('CrawlStateStore', () => {
  let directory: string;
  let store: CrawlStateStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    directory = await mkdtemp(join(tmpdir(), 'crawl-state-'));
    store = new CrawlStateStore(TARGET, directory, () => NOW);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('returns empty progress when no checkpoint exists', async () => {
    const progress = await store.resume();

    expect(progress.target).toBe(TARGET);
    expect(progress.records).toEqual([]);
    expect(progress.errors).toEqual([]);
  });

  it('round-trips records and errors through a checkpoint', async () => {
    let progress = emptyProgress(TARGET);
    progress = recordOutcome(progress, { kind: 'record', record: makeRecord('111') });
    progress = recordOutcome(progress, { kind: 'error', error: makeErrorRecord('222') });

    await store.checkpoint(progress);
    const resumed = await new CrawlStateStore(TARGET, directory).resume();

    expect(resumed.records).toEqual(progress.records);
    expect(resumed.errors).toEqual(progress.errors);
    expect(resumed.status.get('111')).toBe('completed');
    expect(resumed.status.get('222')).toBe('errored');
  });

  it('writes the document atomically and leaves no temp file', async () => {
    await store.checkpoint(emptyProgress(TARGET));

    const document = JSON.parse(await readFile(join(directory, 'progress.json'), 'utf-8'));
    expect(document).toEqual({ target: TARGET, updatedAt: '2024-03-01T12:00:00.000Z', records: [], errors: [] });
    expect(await readdir(directory)).toEqual(['progress.json']);
  });

  it('creates a missing output directory', async () => {
    const nested = new CrawlStateStore(TARGET, join(directory, 'a', 'b'));

    await nested.checkpoint(emptyProgress(TARGET));

    expect(await readdir(join(directory, 'a', 'b'))).toEqual(['progress.json']);
  });

  it('rejects a checkpoint that is not JSON', async () => {
    await writeFile(join(directory, 'progress.json'), '{ truncated', 'utf-8');

    await expect(store.resume()).rejects.toThrow(CheckpointError);
    await expect(store.resume()).rejects.toThrow('is not valid JSON');
  });

  it('rejects a checkpoint with the wrong shape', async () => {
    const document = { target: TARGET, updatedAt: 'x', records: [{ itemId: '1' }], errors: [] };
    await writeFile(join(directory, 'progress.json'), JSON.stringify(document), 'utf-8');

    await expect(store.resume()).rejects.toThrow(/has an unexpected shape at records\.0\.url/);
  });

  it('rejects a checkpoint written for another target', async () => {
    await new CrawlStateStore('https://shop.example.test/str/other', directory).checkpoint(
      emptyProgress('https://shop.example.test/str/other')
    );

    await expect(store.resume()).rejects.toThrow(
      'belongs to target "https://shop.example.test/str/other", not "https://shop.example.test/str/parts"'
    );
  });

  it('saves and loads the identifier list', async () => {
    expect(await store.loadIdentifiers()).toBeNull();

    await store.saveIdentifiers(['100000000001', '100000000002']);

    expect(await readFile(join(directory, 'item_ids.txt'), 'utf-8')).toBe('100000000001\n100000000002\n');
    expect(await store.loadIdentifiers()).toEqual(['100000000001', '100000000002']);
  });
});
