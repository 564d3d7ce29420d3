/**
 * Tests for Monitoring & Observability Module
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

// Mock Sentry
vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  flush: vi.fn(() => Promise.resolve(true)),
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
}));

import * as Sentry from '@sentry/node';
import { initMonitoring, logger, RunMetrics, setLogFile, setLogLevel } from '../monitoring';

describe('Monitoring', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    setLogLevel('info');
    setLogFile(null);
    vi.restoreAllMocks();
  });

  describe('logger', () => {
    it('should write a timestamped line with its context', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      logger.info('Phase starting', { phase: 'websites', records: 3 });

      expect(info).toHaveBeenCalledTimes(1);
      expect(info.mock.calls[0][0]).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Phase starting \{"phase":"websites","records":3\}$/
      );
    });

    it('should drop lines below the minimum level', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      logger.debug('hidden');
      setLogLevel('warn');
      logger.info('also hidden');

      expect(debug).not.toHaveBeenCalled();
      expect(info).not.toHaveBeenCalled();
    });

    it('should leave a breadcrumb for warnings', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.warn('Quota low', { remaining: 5 });

      expect(Sentry.addBreadcrumb).toHaveBeenCalledWith({
        category: 'warning',
        message: 'Quota low',
        level: 'warning',
        data: { remaining: 5 },
      });
    });

    it('should report errors as exceptions and other values as messages', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failure = new Error('boom');

      logger.error('Phase failed', failure, { phase: 'extract' });
      logger.error('Odd failure', 'text', { phase: 'websites' });

      expect(errorSpy.mock.calls[0][0]).toContain('[ERROR] Phase failed {"phase":"extract","error":"boom"}');
      expect(Sentry.captureException).toHaveBeenCalledWith(failure, {
        extra: { phase: 'extract' },
        tags: { component: 'faculty-pipeline' },
      });
      expect(Sentry.captureMessage).toHaveBeenCalledWith('Odd failure', {
        level: 'error',
        extra: { error: 'text', phase: 'websites' },
      });
    });

    it('should mirror lines to the log file', async () => {
      vi.spyOn(console, 'info').mockImplementation(() => {});
      const dir = await mkdtemp(join(tmpdir(), 'log-'));
      const path = join(dir, 'run.log');

      setLogFile(path);
      logger.info('first');
      logger.info('second');

      const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toMatch(/\[INFO\] second$/);
      await rm(dir, { recursive: true, force: true });
    });
  });

  describe('initMonitoring', () => {
    it('should stay disabled without a DSN', () => {
      expect(initMonitoring({ dsn: null })).toBe(false);
      expect(Sentry.init).not.toHaveBeenCalled();
    });

    it('should initialize Sentry with a DSN', () => {
      expect(initMonitoring({ dsn: 'https://public@sentry.example.com/1', environment: 'test', release: '4.5.0' })).toBe(
        true
      );
      expect(Sentry.init).toHaveBeenCalledWith({
        dsn: 'https://public@sentry.example.com/1',
        environment: 'test',
        release: '4.5.0',
        tracesSampleRate: 0,
      });
    });
  });

  describe('RunMetrics', () => {
    it('should count item errors per phase', () => {
      const metrics = new RunMetrics(1000);
      metrics.recordItemError('directories', 'page failed');
      metrics.recordItemError('directories', 'page failed');
      metrics.recordItemError('orcid_emails', 'lookup failed');

      expect(metrics.itemErrorCount('directories')).toBe(2);
      expect(metrics.itemErrorCount('websites')).toBe(0);
      expect(metrics.snapshot(4000)).toMatchObject({
        startedAt: 1000,
        durationMs: 3000,
        itemErrors: { directories: 2, orcid_emails: 1 },
      });
    });

    it('should keep the first phase that ran out of quota', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const metrics = new RunMetrics();

      metrics.markQuotaExhausted('websites');
      metrics.markQuotaExhausted('fallback_emails');

      expect(metrics.quotaExhaustedIn).toBe('websites');
      expect(Sentry.addBreadcrumb).toHaveBeenCalledTimes(1);
    });

    it('should time finished phases', () => {
      const metrics = new RunMetrics();
      metrics.phaseStarted('extract');
      metrics.phaseFinished('extract');
      metrics.phaseFinished('websites');

      expect(Object.keys(metrics.snapshot().phaseDurationsMs)).toEqual(['extract']);
    });
  });
});
