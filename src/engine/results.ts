import { z } from 'zod';
import fs from 'node:fs';
import type { ResultMapping } from './scheduler.js';
import { SourceError } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { ensureParentDir, errorMessage } from '../shared/utils.js';

const logger = componentLogger('results');

const ResultFileSchema = z.record(z.array(z.string()));

/**
 * Write the mapping as a JSON object of URL -> titles.
 */
export function saveResults(mapping: ResultMapping, filePath: string): void {
  ensureParentDir(filePath);
  const json = JSON.stringify(Object.fromEntries(mapping), null, 4);
  fs.writeFileSync(filePath, `${json}\n`, 'utf-8');
  logger.info({ path: filePath, feeds: mapping.size }, 'Results saved');
}

export function loadResults(filePath: string): ResultMapping {
  if (!fs.existsSync(filePath)) {
    throw new SourceError(`Results file not found: ${filePath}`, { path: filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new SourceError(`Results file is not valid JSON: ${filePath}`, {
      path: filePath,
      error: errorMessage(err),
    });
  }

  const parsed = ResultFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceError(`Results file has an unexpected shape: ${filePath}`, {
      path: filePath,
      errors: parsed.error.flatten().formErrors,
    });
  }
  return new Map(Object.entries(parsed.data));
}
