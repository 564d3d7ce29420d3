/**
 * Faculty Contact Pipeline - public API
 */

// ============================================================================
// Orchestration
// ============================================================================
export {
  FacultyPipeline,
  planPhases,
  type PipelineOptions,
  type PipelineResult,
  type RunMetadata,
  type RunOptions,
  type SkippablePhase,
} from './pipeline';

export { CheckpointStore, phaseIndex } from './checkpoint';

// ============================================================================
// Configuration
// ============================================================================
export {
  loadConfig,
  getInstitution,
  listInstitutions,
  DEFAULT_THRESHOLDS,
  PIPELINE_VERSION,
  type PipelineConfig,
  type InstitutionConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './config';

// ============================================================================
// Sources
// ============================================================================
export { BibliometricExtractor, parseResearchProfile, CATALOG_BASE_URL } from './bibliometric-extractor';

export {
  DirectoryScraper,
  parseDirectoryPage,
  type DirectoryEntry,
  type DirectoryWebsiteMatch,
} from './directory-scraper';

export { BraveSearchClient, type SearchResult, type WebSearch, type SearchClientState } from './search-client';

export {
  WebsiteDiscovery,
  scoreSearchResult,
  classifyPageType,
  buildWebsiteQueries,
  selectWebsite,
  type ScoredCandidate,
  type WebsiteBatchSummary,
} from './website-discovery';

export { WebsiteEmailExtractor, selectBestEmail, type ScoredEmail } from './email-finder';
export { OrcidEmailLookup, extractOrcidId } from './orcid-lookup';
export { FallbackEmailSearch, buildFallbackQueries, type FallbackBatchSummary } from './email-search';

// ============================================================================
// Matching and Quality
// ============================================================================
export { normalizeName, getNameParts, generateNameVariations, nameSimilarity, emailNameScore } from './name-matcher';
export { isAcceptableEmail, isGenericEmail, extractEmailsFromText } from './email-patterns';
export { mergeEmailFact, mergeWebsiteFact, isMoreConfident } from './fact-merge';
export { applyReviewFlags, summarizeCoverage, type CoverageSummary } from './data-quality';

// ============================================================================
// Export and Infrastructure
// ============================================================================
export { writeOutputs, generateCsv, generateJson, generateWorkbook, escapeCsvField } from './export';

export {
  AppError,
  ConfigurationError,
  SearchAuthError,
  QuotaExhaustedError,
  RateLimitError,
  getErrorMessage,
  isFatalError,
  withRetry,
} from './errors';

export { logger, setLogLevel, setLogFile, initMonitoring, flushMonitoring, RunMetrics } from './monitoring';

export * from '../types/faculty';
