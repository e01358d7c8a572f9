import type { FetchOutcome, InvalidReason, ProbeFn } from '../source/probe.js';
import { ConfigError, VerifyError } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/utils.js';

const logger = componentLogger('scheduler');

/** Feed URL -> clean titles, for valid feeds only. */
export type ResultMapping = ReadonlyMap<string, readonly string[]>;

export interface RunStatistics {
  total: number;
  valid: number;
  validPercent: number;
}

export interface VerificationProgress {
  completed: number;
  total: number;
  url: string;
  outcome: FetchOutcome;
}

export interface VerificationOptions {
  workers: number;
  taskTimeoutMs: number;
  probe: ProbeFn;
  onProgress?: (progress: VerificationProgress) => void;
}

export interface VerificationRun {
  mapping: ResultMapping;
  stats: RunStatistics;
  failures: Record<InvalidReason, number>;
  durationMs: number;
}

/**
 * Single owner of the result mapping. Every URL is recorded exactly once;
 * invalid outcomes are counted but never stored.
 */
export class ResultCollector {
  private readonly mapping = new Map<string, readonly string[]>();
  private readonly recorded = new Set<string>();
  private readonly failureCounts: Record<InvalidReason, number> = {
    network_failure: 0,
    non_feed_response: 0,
    empty_feed: 0,
  };

  record(url: string, outcome: FetchOutcome): void {
    if (this.recorded.has(url)) {
      throw new VerifyError(`Outcome already recorded for ${url}`, { url });
    }
    this.recorded.add(url);

    if (outcome.status === 'valid') {
      this.mapping.set(url, Object.freeze([...outcome.titles]));
    } else {
      this.failureCounts[outcome.reason]++;
    }
  }

  get completed(): number {
    return this.recorded.size;
  }

  get failures(): Record<InvalidReason, number> {
    return { ...this.failureCounts };
  }

  snapshot(): ResultMapping {
    return new Map(this.mapping);
  }
}

export function computeStats(total: number, mapping: ResultMapping): RunStatistics {
  const valid = mapping.size;
  return {
    total,
    valid,
    validPercent: total === 0 ? 0 : (valid / total) * 100,
  };
}

/**
 * Start `size` workers that each take the next URL off a shared queue until
 * it is empty, so at most `size` tasks are in flight at any time.
 */
async function drainQueue(
  urls: readonly string[],
  size: number,
  task: (url: string) => Promise<void>,
): Promise<void> {
  const queue = [...urls];
  const worker = async (): Promise<void> => {
    for (let url = queue.shift(); url !== undefined; url = queue.shift()) {
      await task(url);
    }
  };
  await Promise.all(Array.from({ length: Math.min(size, queue.length) }, worker));
}

/**
 * Run one probe under a deadline. On expiry the probe's signal is aborted and
 * the task resolves invalid without waiting for the probe to settle.
 */
async function runTask(url: string, probe: ProbeFn, timeoutMs: number): Promise<FetchOutcome> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<FetchOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        status: 'invalid',
        reason: 'network_failure',
        detail: `task timed out after ${timeoutMs}ms`,
      });
    }, timeoutMs);
  });

  const attempt = Promise.resolve()
    .then(() => probe(url, controller.signal))
    .catch(
      (err: unknown): FetchOutcome => ({
        status: 'invalid',
        reason: 'network_failure',
        detail: errorMessage(err),
      }),
    );

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function validateOptions(options: VerificationOptions): void {
  if (!Number.isInteger(options.workers) || options.workers < 1) {
    throw new ConfigError(`Worker count must be a positive integer, got ${options.workers}`, {
      workers: options.workers,
    });
  }
  if (!Number.isFinite(options.taskTimeoutMs) || options.taskTimeoutMs <= 0) {
    throw new ConfigError(`Task timeout must be a positive number, got ${options.taskTimeoutMs}`, {
      taskTimeoutMs: options.taskTimeoutMs,
    });
  }
}

/**
 * Probe every URL through a bounded worker pool and wait for all of them.
 * Per-URL failures never abort the run; only invalid options throw, and they
 * do so before anything is dispatched.
 */
export async function runVerification(
  urls: Iterable<string>,
  options: VerificationOptions,
): Promise<VerificationRun> {
  validateOptions(options);

  const startTime = Date.now();
  const unique = [...new Set(urls)];
  const collector = new ResultCollector();

  logger.info({ total: unique.length, workers: options.workers }, 'Verifying feeds');

  await drainQueue(unique, options.workers, async (url) => {
    const outcome = await runTask(url, options.probe, options.taskTimeoutMs);
    collector.record(url, outcome);

    if (options.onProgress) {
      try {
        options.onProgress({
          completed: collector.completed,
          total: unique.length,
          url,
          outcome,
        });
      } catch (err) {
        logger.warn({ url, error: errorMessage(err) }, 'Progress callback failed');
      }
    }
  });

  const mapping = collector.snapshot();
  const stats = computeStats(unique.length, mapping);
  const durationMs = Date.now() - startTime;

  logger.info(
    {
      total: stats.total,
      valid: stats.valid,
      validPercent: Number(stats.validPercent.toFixed(2)),
      durationMs,
    },
    'Verification complete',
  );

  return { mapping, stats, failures: collector.failures, durationMs };
}
