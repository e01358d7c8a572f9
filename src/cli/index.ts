#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, applyVerifyOverrides, writeDefaultConfig } from '../shared/config.js';
import { getFeedprobeDir, resolvePath, errorMessage } from '../shared/utils.js';
import { FeedprobeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { readCandidateUrls } from '../source/urls.js';
import { createFeedProber } from '../source/probe.js';
import { normalizeTitle } from '../source/normalize.js';
import { runVerification } from '../engine/scheduler.js';
import { auditResults, describeFinding, logFindings } from '../engine/audit.js';
import { saveResults, loadResults } from '../engine/results.js';

const program = new Command();

program
  .name('feedprobe')
  .description('Verify RSS/Atom feed URLs and extract clean entry titles')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create a default config at ~/.feedprobe/config.yaml')
  .action(() => {
    const configPath = path.join(getFeedprobeDir(), 'config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === verify ===
program
  .command('verify <input>')
  .description('Probe every URL found in a text or OPML file and save valid feeds')
  .option('-w, --workers <n>', 'Concurrent probes')
  .option('-t, --timeout <ms>', 'Per-URL limit in milliseconds, for the request and the whole task')
  .option('-n, --max-titles <n>', 'Titles to keep per feed')
  .option('-o, --out <file>', 'Where to write the results JSON')
  .option('--no-audit', 'Skip the sanity checks')
  .action(
    async (
      input: string,
      opts: { workers?: string; timeout?: string; maxTitles?: string; out?: string; audit: boolean },
    ) => {
      const config = applyVerifyOverrides(await loadConfig(), opts);
      const urls = readCandidateUrls(resolvePath(input));
      log(`Found ${urls.length} candidate URLs`);

      const run = await runVerification(urls, {
        workers: config.verify.workers,
        taskTimeoutMs: config.verify.task_timeout_ms,
        probe: createFeedProber({
          timeoutMs: config.verify.fetch_timeout_ms,
          maxTitles: config.verify.max_titles,
          userAgent: config.verify.user_agent,
        }),
        onProgress: ({ completed, total, url, outcome }) => {
          logger.debug({ url, status: outcome.status }, `Processed ${completed}/${total}`);
        },
      });

      const outPath = resolvePath(opts.out ?? config.output.path);
      saveResults(run.mapping, outPath);

      const { total, valid, validPercent } = run.stats;
      log(`✓ ${valid}/${total} valid feeds (${validPercent.toFixed(2)}%) in ${run.durationMs}ms`);
      log(
        `  unreachable: ${run.failures.network_failure}  not a feed: ${run.failures.non_feed_response}  empty: ${run.failures.empty_feed}`,
      );
      log(`✓ Results written to ${outPath}`);

      if (opts.audit) {
        logFindings(
          auditResults(run.mapping, {
            minTitleLength: config.audit.min_title_length,
            minTitles: config.audit.min_titles,
          }),
        );
      }
    },
  );

// === audit ===
program
  .command('audit <results>')
  .description('Run sanity checks over a saved results file')
  .action(async (resultsPath: string) => {
    const config = await loadConfig();
    const mapping = loadResults(resolvePath(resultsPath));
    const findings = auditResults(mapping, {
      minTitleLength: config.audit.min_title_length,
      minTitles: config.audit.min_titles,
    });

    if (findings.length === 0) {
      log(`✓ ${mapping.size} feeds checked, nothing to report`);
      return;
    }
    for (const finding of findings) {
      log(`! ${describeFinding(finding)}`);
    }
    log(`\n${findings.length} findings across ${mapping.size} feeds`);
  });

// === clean ===
program
  .command('clean <title...>')
  .description('Print the normalized form of a title')
  .action((parts: string[]) => {
    log(normalizeTitle(parts.join(' ')));
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof FeedprobeError) {
    logger.error({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ error: errorMessage(err) }, 'Command failed');
  }
  process.exitCode = 1;
});
