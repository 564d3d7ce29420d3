/**
 * Pipeline Orchestrator
 *
 * Runs the phases in order over one shared record array, saving a
 * checkpoint after each. Which phases run is decided up front by
 * `planPhases` from the latest checkpoint and the run options. Whatever
 * happens, the run ends with the records gathered so far and a metadata
 * block describing coverage and how the run went.
 */

import { PIPELINE_PHASES, type FacultyRecord, type PipelinePhase } from '../types/faculty';
import { BibliometricExtractor } from './bibliometric-extractor';
import { CheckpointStore, phaseIndex } from './checkpoint';
import type { PipelineConfig } from './config';
import { applyReviewFlags, summarizeCoverage, type CoverageSummary } from './data-quality';
import { DirectoryScraper } from './directory-scraper';
import { WebsiteEmailExtractor } from './email-finder';
import { FallbackEmailSearch } from './email-search';
import { getErrorMessage, isFatalError } from './errors';
import { mergeEmailFact } from './fact-merge';
import { logger, RunMetrics } from './monitoring';
import { OrcidEmailLookup } from './orcid-lookup';
import { PageFetcher } from './page-fetcher';
import { RateLimiter } from './rate-limiter';
import { BraveSearchClient, type WebSearch } from './search-client';
import { WebsiteDiscovery } from './website-discovery';

// ============ Types ============

export type SkippablePhase = Exclude<PipelinePhase, 'extract'>;

export interface RunOptions {
  maxRecords?: number | null;
  /** Continue after the latest completed checkpoint. */
  resume?: boolean;
  /** Re-run website discovery on the latest checkpoint. */
  onlyWebsites?: boolean;
  /** Re-run the email phases on the latest checkpoint. */
  onlyEmails?: boolean;
  skip?: readonly SkippablePhase[];
  clearCheckpoints?: boolean;
}

export interface RunMetadata extends CoverageSummary {
  institution: string;
  institutionKey: string;
  generatedAt: string;
  version: string;
  resumedFrom: PipelinePhase | null;
  phasesCompleted: PipelinePhase[];
  phasesSkipped: PipelinePhase[];
  searchQueriesUsed: number;
  searchQueriesFailed: number;
  searchRateLimitHits: number;
  itemErrors: Partial<Record<PipelinePhase, number>>;
  durationMinutes: number;
  endedEarlyDueToQuota: boolean;
  quotaExhaustedIn: PipelinePhase | null;
  /** Phases whose snapshot could not be written; a resume repeats them. */
  checkpointFailures: PipelinePhase[];
  abortedAt?: PipelinePhase;
  abortReason?: string;
}

export interface PipelineResult {
  metadata: RunMetadata;
  faculty: FacultyRecord[];
}

export interface PipelineOptions {
  checkpointDir: string;
  /** Defaults to the Brave client built from the config. */
  search?: WebSearch;
}

const EMAIL_PHASES: readonly PipelinePhase[] = ['orcid_emails', 'website_emails', 'fallback_emails'];

// ============ Planning ============

/**
 * Phases to run, in order. Only-modes need a checkpoint to work on; without
 * one they fall through to a normal run. Resume starts after the latest
 * completed phase. Skip flags apply to normal and resumed runs.
 */
export function planPhases(
  latest: PipelinePhase | null,
  options: Pick<RunOptions, 'resume' | 'onlyWebsites' | 'onlyEmails' | 'skip'>
): PipelinePhase[] {
  const onlyWebsites = options.onlyWebsites === true;
  const onlyEmails = options.onlyEmails === true;

  if (latest !== null && (onlyWebsites || onlyEmails)) {
    return PIPELINE_PHASES.filter(
      (phase) => (onlyWebsites && phase === 'websites') || (onlyEmails && EMAIL_PHASES.includes(phase))
    );
  }

  const skip = new Set<PipelinePhase>(options.skip ?? []);
  const start = options.resume && latest !== null ? phaseIndex(latest) + 1 : 0;
  return PIPELINE_PHASES.filter((phase, index) => index >= start && !skip.has(phase));
}

// ============ Orchestrator ============

/** One instance per run: counters and caches live on it. */
export class FacultyPipeline {
  readonly metrics = new RunMetrics();
  private readonly checkpoints: CheckpointStore;
  private readonly search: WebSearch;
  private readonly extractor: BibliometricExtractor;
  private readonly directory: DirectoryScraper;
  private readonly websites: WebsiteDiscovery;
  private readonly orcid: OrcidEmailLookup;
  private readonly websiteEmails: WebsiteEmailExtractor;
  private readonly fallback: FallbackEmailSearch;

  constructor(
    private readonly config: PipelineConfig,
    options: PipelineOptions
  ) {
    const limiter = new RateLimiter(config.delays);
    const fetcher = new PageFetcher({
      userAgent: config.pageUserAgent,
      timeoutMs: config.timeouts.page,
      maxAttempts: config.retry.maxAttempts,
      backoffBaseMs: config.retry.backoffBaseMs,
      limiter,
    });

    this.checkpoints = new CheckpointStore(options.checkpointDir, config.institution.key);
    this.search = options.search ?? new BraveSearchClient(config, limiter);
    this.extractor = new BibliometricExtractor(config, limiter);
    this.directory = new DirectoryScraper(config, fetcher, this.metrics);
    this.websites = new WebsiteDiscovery(config, this.search);
    this.orcid = new OrcidEmailLookup(config, limiter, this.metrics);
    this.websiteEmails = new WebsiteEmailExtractor(config, fetcher, this.metrics);
    this.fallback = new FallbackEmailSearch(config, this.search);
  }

  async run(options: RunOptions = {}): Promise<PipelineResult> {
    const { institution } = this.config;
    logger.info('Faculty pipeline starting', {
      institution: institution.name,
      version: this.config.version,
      resume: options.resume ?? false,
      onlyWebsites: options.onlyWebsites ?? false,
      onlyEmails: options.onlyEmails ?? false,
    });

    if (options.clearCheckpoints) {
      const removed = await this.checkpoints.clear();
      logger.info('Checkpoints cleared', { removed });
    }

    let records: FacultyRecord[] = [];
    let resumedFrom: PipelinePhase | null = null;

    if (options.resume || options.onlyWebsites || options.onlyEmails) {
      const snapshot = await this.checkpoints.loadLatest();
      if (snapshot) {
        records = snapshot.records;
        resumedFrom = snapshot.phase;
        if (snapshot.extra.directoryCache) {
          this.directory.restore(snapshot.extra.directoryCache);
        }
        logger.info('Resuming from checkpoint', { phase: snapshot.phase, records: records.length });
      } else {
        logger.warn('No checkpoint found, starting fresh');
      }
    }

    const plan = planPhases(resumedFrom, options);
    const completed: PipelinePhase[] = [];
    const checkpointFailures: PipelinePhase[] = [];
    let abort: { phase: PipelinePhase; reason: string } | null = null;

    for (const phase of plan) {
      if (phase === 'fallback_emails' && this.search.quotaExhausted) {
        this.metrics.markQuotaExhausted(phase);
        logger.warn('Search quota exhausted, skipping fallback email search');
        continue;
      }

      logger.info('Phase starting', { phase, records: records.length });
      this.metrics.phaseStarted(phase);
      try {
        records = await this.runPhase(phase, records, options.maxRecords ?? null);
      } catch (error) {
        abort = { phase, reason: getErrorMessage(error) };
        if (isFatalError(error)) {
          logger.error('Fatal error, ending run early', error, { phase });
        } else {
          logger.error('Unexpected error, ending run early', error, { phase });
        }
        break;
      } finally {
        this.metrics.phaseFinished(phase);
      }

      if (phase === 'extract' && records.length === 0) {
        abort = { phase, reason: 'No faculty extracted' };
        logger.error('No faculty extracted, ending run', undefined, { institution: institution.name });
        break;
      }

      try {
        await this.checkpoints.save(phase, records, phase === 'extract' ? {} : { directoryCache: this.directory.toCache() });
      } catch (error) {
        checkpointFailures.push(phase);
        this.metrics.recordItemError(phase, 'Checkpoint save failed');
        logger.error('Checkpoint save failed, continuing without it', error, { phase });
      }
      completed.push(phase);
    }

    applyReviewFlags(records);
    const metadata = this.compileMetadata(records, { resumedFrom, completed, checkpointFailures, abort });
    this.logSummary(metadata);
    return { metadata, faculty: records };
  }

  private async runPhase(phase: PipelinePhase, records: FacultyRecord[], maxRecords: number | null): Promise<FacultyRecord[]> {
    switch (phase) {
      case 'extract':
        return this.extractor.extract(maxRecords);

      case 'directories': {
        await this.directory.scrapeAll();
        let matched = 0;
        for (const record of records) {
          if (record.email) continue;
          if (mergeEmailFact(record, this.directory.lookupEmail(record.name))) matched++;
        }
        logger.info('Directory email matches', { matched });
        return records;
      }

      case 'websites': {
        const summary = await this.websites.discoverWebsites(records, this.directory);
        if (summary.stoppedForQuota) this.metrics.markQuotaExhausted(phase);
        return records;
      }

      case 'orcid_emails':
        await this.orcid.lookupEmails(records);
        return records;

      case 'website_emails':
        await this.websiteEmails.extractEmails(records);
        return records;

      case 'fallback_emails': {
        const summary = await this.fallback.searchEmails(records);
        if (summary.stoppedForQuota) this.metrics.markQuotaExhausted(phase);
        return records;
      }
    }
  }

  private compileMetadata(
    records: FacultyRecord[],
    run: {
      resumedFrom: PipelinePhase | null;
      completed: PipelinePhase[];
      checkpointFailures: PipelinePhase[];
      abort: { phase: PipelinePhase; reason: string } | null;
    }
  ): RunMetadata {
    const metrics = this.metrics.snapshot();
    const { institution } = this.config;

    return {
      institution: institution.name,
      institutionKey: institution.key,
      generatedAt: new Date().toISOString(),
      version: this.config.version,
      ...summarizeCoverage(records),
      resumedFrom: run.resumedFrom,
      phasesCompleted: run.completed,
      phasesSkipped: PIPELINE_PHASES.filter((phase) => !run.completed.includes(phase)),
      searchQueriesUsed: this.search.queriesUsed,
      searchQueriesFailed: this.search.queriesFailed,
      searchRateLimitHits: this.search.rateLimitHits,
      itemErrors: metrics.itemErrors,
      durationMinutes: Math.round(metrics.durationMs / 6000) / 10,
      endedEarlyDueToQuota: metrics.quotaExhaustedIn !== null,
      quotaExhaustedIn: metrics.quotaExhaustedIn,
      checkpointFailures: run.checkpointFailures,
      ...(run.abort && { abortedAt: run.abort.phase, abortReason: run.abort.reason }),
    };
  }

  private logSummary(metadata: RunMetadata): void {
    const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

    logger.info('Final statistics', {
      totalFaculty: metadata.totalFaculty,
      websites: `${metadata.websitesFound} (${percent(metadata.websiteCoverage)})`,
      emails: `${metadata.emailsFound} (${percent(metadata.emailCoverage)})`,
      emailSources: metadata.emailsBySource,
      highConfidenceEmails: metadata.highConfidenceEmails,
      researchTopics: percent(metadata.researchCoverage),
      needingReview: metadata.needingReview,
      searchQueries: metadata.searchQueriesUsed,
      durationMinutes: metadata.durationMinutes,
    });

    if (metadata.endedEarlyDueToQuota) {
      logger.warn('Search quota ran out; resume later to fill the remaining records', {
        phase: metadata.quotaExhaustedIn,
      });
    }
  }
}
