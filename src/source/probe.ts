import Parser from 'rss-parser';
import { normalizeTitle } from './normalize.js';
import { ConfigError } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/utils.js';

const logger = componentLogger('probe');

export type InvalidReason = 'network_failure' | 'non_feed_response' | 'empty_feed';

/**
 * Terminal result of probing one URL. Expected failures are values, not throws.
 */
export type FetchOutcome =
  | { status: 'valid'; titles: string[] }
  | { status: 'invalid'; reason: InvalidReason; detail: string };

export interface ProbeOptions {
  timeoutMs: number;
  maxTitles: number;
  userAgent?: string;
  /** Aborts the request early, e.g. when the scheduler gives up on the task. */
  signal?: AbortSignal;
}

/** Probe signature the scheduler depends on. */
export type ProbeFn = (url: string, signal: AbortSignal) => Promise<FetchOutcome>;

interface TitledEntry {
  title?: string;
}

const FEED_CONTENT_TYPE_MARKERS = ['xml', 'rss'];

const parser = new Parser();

function invalid(reason: InvalidReason, detail: string): FetchOutcome {
  return { status: 'invalid', reason, detail };
}

export function isFeedContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const lowered = contentType.toLowerCase();
  return FEED_CONTENT_TYPE_MARKERS.some((marker) => lowered.includes(marker));
}

/**
 * Normalize entry titles in document order, keeping at most `maxTitles`.
 * Entries without a usable title are skipped and do not count toward the limit.
 */
export function extractTitles(entries: readonly TitledEntry[], maxTitles: number): string[] {
  const titles: string[] = [];
  for (const entry of entries) {
    if (titles.length >= maxTitles) break;
    const raw = entry.title;
    if (typeof raw !== 'string' || raw.trim() === '') continue;

    const clean = normalizeTitle(raw);
    if (clean) titles.push(clean);
  }
  return titles;
}

async function classify(url: string, options: ProbeOptions): Promise<FetchOutcome> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const onCallerAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': options.userAgent ?? 'feedprobe/0.1',
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });
    } catch (err) {
      if (options.signal?.aborted) {
        return invalid('network_failure', 'aborted by caller');
      }
      if (controller.signal.aborted) {
        return invalid('network_failure', `timed out after ${options.timeoutMs}ms`);
      }
      return invalid('network_failure', errorMessage(err));
    }

    if (!response.ok) {
      return invalid('non_feed_response', `HTTP ${response.status}`);
    }

    const contentType = response.headers.get('content-type');
    if (!isFeedContentType(contentType)) {
      return invalid('non_feed_response', `content-type ${contentType ?? '(none)'}`);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      return invalid('network_failure', errorMessage(err));
    }

    let entries: TitledEntry[];
    try {
      const feed = await parser.parseString(body);
      entries = feed.items ?? [];
    } catch (err) {
      return invalid('non_feed_response', `unparsable feed: ${errorMessage(err)}`);
    }

    const titles = extractTitles(entries, options.maxTitles);
    if (titles.length === 0) {
      return invalid('empty_feed', 'no usable titles');
    }
    return { status: 'valid', titles };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

function validateProbeOptions(options: Omit<ProbeOptions, 'signal'>): void {
  if (!Number.isInteger(options.maxTitles) || options.maxTitles < 1) {
    throw new ConfigError(`Title limit must be a positive integer, got ${options.maxTitles}`, {
      maxTitles: options.maxTitles,
    });
  }
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new ConfigError(`Fetch timeout must be a positive number, got ${options.timeoutMs}`, {
      timeoutMs: options.timeoutMs,
    });
  }
}

/**
 * Fetch one URL and decide whether it is a non-empty RSS/Atom feed.
 * Every per-URL failure maps to an `invalid` outcome; only invalid options
 * reject, with `ConfigError`, before any request is made.
 */
export async function probeFeed(url: string, options: ProbeOptions): Promise<FetchOutcome> {
  validateProbeOptions(options);

  let outcome: FetchOutcome;
  try {
    outcome = await classify(url, options);
  } catch (err) {
    outcome = invalid('network_failure', errorMessage(err));
  }

  if (outcome.status === 'invalid') {
    logger.debug({ url, reason: outcome.reason, detail: outcome.detail }, 'Feed probe rejected');
  } else {
    logger.debug({ url, count: outcome.titles.length }, 'Feed probe accepted');
  }
  return outcome;
}

/** Bind options once; invalid ones throw here rather than on every URL. */
export function createFeedProber(options: Omit<ProbeOptions, 'signal'>): ProbeFn {
  validateProbeOptions(options);
  return (url, signal) => probeFeed(url, { ...options, signal });
}
