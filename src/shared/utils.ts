import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function getFeedprobeDir(): string {
  return resolvePath('~/.feedprobe');
}

export function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

/**
 * Length in code points, so an astral character counts once.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
