/**
 * Tests for Checkpoint Store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CheckpointStore, phaseIndex } from '../checkpoint';
import { WebsiteEmailExtractor } from '../email-finder';
import { RunMetrics } from '../monitoring';
import { createTestConfig, createTestFetcher, htmlResponse, makeRecord, stubRoutes } from './test-utils';

describe('CheckpointStore', () => {
  let dir: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoints-'));
    store = new CheckpointStore(dir, 'Harvard');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should name files by institution and phase', () => {
    expect(store.pathFor('websites')).toBe(join(dir, 'harvard_websites.json'));
  });

  it('should round-trip records and side caches', async () => {
    const records = [
      makeRecord({
        name: 'Maria Garcia',
        email: {
          value: 'maria.garcia@fas.harvard.edu',
          source: 'orcid',
          confidence: 'high',
          extractedFrom: 'https://orcid.org/0000-0001-2345-6789',
          extractionMethod: 'orcid_api',
          nameMatchScore: 1,
        },
      }),
    ];
    const directoryCache = { emails: { 'maria garcia': 'maria.garcia@fas.harvard.edu' }, websites: {} };

    await store.save('directories', records, { directoryCache });
    const snapshot = await store.load('directories');

    expect(snapshot?.phase).toBe('directories');
    expect(snapshot?.institution).toBe('harvard');
    expect(snapshot?.records).toEqual(records);
    expect(snapshot?.extra.directoryCache).toEqual(directoryCache);
  });

  it('should reload a record whose email came from a multi-recipient mailto', async () => {
    const url = 'https://scholar.harvard.edu/mgarcia';
    stubRoutes({
      [url]: () =>
        htmlResponse('<p>Maria Garcia</p><a href="mailto:maria.garcia@harvard.edu,labadmin@harvard.edu">Email</a>'),
    });
    const config = createTestConfig();
    const extractor = new WebsiteEmailExtractor(config, createTestFetcher(config), new RunMetrics());
    const record = makeRecord({
      name: 'Maria Garcia',
      website: { value: url, source: 'search', confidence: 'high', score: 1, signals: [], pageType: 'personal' },
    });

    await extractor.extractEmails([record]);
    expect(record.email?.value).toBe('maria.garcia@harvard.edu');

    await store.save('website_emails', [record]);
    const snapshot = await store.load('website_emails');

    expect(snapshot?.records).toEqual([record]);
    expect(await store.loadLatest()).toEqual(snapshot);
  });

  it('should return null for a missing snapshot', async () => {
    expect(await store.load('extract')).toBeNull();
    expect(await store.latestCompletedPhase()).toBeNull();
  });

  it('should treat invalid JSON as no checkpoint', async () => {
    await writeFile(store.pathFor('extract'), '{"phase": "extract", "records": [', 'utf-8');
    expect(await store.load('extract')).toBeNull();
  });

  it('should reject snapshots whose records fail validation', async () => {
    await writeFile(
      store.pathFor('extract'),
      JSON.stringify({ phase: 'extract', timestamp: 'now', institution: 'harvard', records: [{ name: '' }] }),
      'utf-8'
    );
    expect(await store.load('extract')).toBeNull();
  });

  it('should report the most advanced phase present', async () => {
    await store.save('extract', [makeRecord({ name: 'A Person' })]);
    await store.save('websites', [makeRecord({ name: 'A Person' })]);

    expect(await store.latestCompletedPhase()).toBe('websites');
  });

  it('should fall back to an earlier snapshot when the latest is corrupt', async () => {
    await store.save('extract', [makeRecord({ name: 'A Person' })]);
    await writeFile(store.pathFor('directories'), 'not json', 'utf-8');

    const snapshot = await store.loadLatest();
    expect(snapshot?.phase).toBe('extract');
    expect(snapshot?.records).toHaveLength(1);
  });

  it('should clear only this institution', async () => {
    const other = new CheckpointStore(dir, 'mit');
    await store.save('extract', [makeRecord({ name: 'A Person' })]);
    await store.save('websites', [makeRecord({ name: 'A Person' })]);
    await other.save('extract', [makeRecord({ name: 'B Person' })]);

    expect(await store.clear()).toBe(2);
    expect(await readdir(dir)).toEqual(['mit_extract.json']);
  });
});

describe('phaseIndex', () => {
  it('should order phases from extraction to fallback', () => {
    expect(phaseIndex('extract')).toBe(0);
    expect(phaseIndex('fallback_emails')).toBe(5);
    expect(phaseIndex('orcid_emails')).toBeLessThan(phaseIndex('website_emails'));
  });
});
