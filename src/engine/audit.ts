import type { ResultMapping } from './scheduler.js';
import { componentLogger } from '../shared/logger.js';
import { codePointLength } from '../shared/utils.js';

const logger = componentLogger('audit');

export type Finding =
  | { kind: 'empty_titles'; url: string }
  | { kind: 'short_title'; url: string; title: string }
  | { kind: 'sparse_feed'; url: string; titles: readonly string[] };

export interface AuditOptions {
  minTitleLength?: number;
  minTitles?: number;
}

/**
 * Flag entries worth a manual look: feeds with no titles, titles that look
 * truncated, and feeds that yielded very few titles. Read-only and advisory.
 */
export function auditResults(mapping: ResultMapping, options: AuditOptions = {}): Finding[] {
  const { minTitleLength = 10, minTitles = 3 } = options;
  const findings: Finding[] = [];

  for (const [url, titles] of mapping) {
    if (titles.length === 0) {
      findings.push({ kind: 'empty_titles', url });
      continue;
    }

    for (const title of titles) {
      if (codePointLength(title) < minTitleLength) {
        findings.push({ kind: 'short_title', url, title });
      }
    }

    if (titles.length < minTitles) {
      findings.push({ kind: 'sparse_feed', url, titles });
    }
  }

  return findings;
}

export function describeFinding(finding: Finding): string {
  switch (finding.kind) {
    case 'empty_titles':
      return `No titles found for ${finding.url}`;
    case 'short_title':
      return `Short title for ${finding.url}: "${finding.title}"`;
    case 'sparse_feed':
      return `Only ${finding.titles.length} title(s) found for ${finding.url}`;
  }
}

export function logFindings(findings: readonly Finding[]): void {
  for (const finding of findings) {
    logger.warn({ kind: finding.kind, url: finding.url }, describeFinding(finding));
  }
  logger.info({ findings: findings.length }, 'Sanity checks completed');
}
