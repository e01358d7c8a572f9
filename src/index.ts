export {
  normalizeTitle,
  stripMarkup,
  repairEncoding,
  replaceKnownSequences,
  removeUnwantedCharacters,
  normalizeWhitespace,
} from './source/normalize.js';
export { probeFeed, createFeedProber, extractTitles, isFeedContentType } from './source/probe.js';
export type { FetchOutcome, InvalidReason, ProbeFn, ProbeOptions } from './source/probe.js';
export { extractUrls, parseOpml, readCandidateUrls } from './source/urls.js';
export { runVerification, computeStats, ResultCollector } from './engine/scheduler.js';
export type {
  ResultMapping,
  RunStatistics,
  VerificationOptions,
  VerificationProgress,
  VerificationRun,
} from './engine/scheduler.js';
export { auditResults, describeFinding, logFindings } from './engine/audit.js';
export type { Finding, AuditOptions } from './engine/audit.js';
export { saveResults, loadResults } from './engine/results.js';
export { loadConfig, parseConfig, ConfigSchema } from './shared/config.js';
export type { Config } from './shared/config.js';
export { FeedprobeError, ConfigError, SourceError, VerifyError } from './shared/errors.js';
