import fs from 'fs';
import path from 'path';
import type { ScanMode } from '../utils/config';
import type { GitRunner } from '../utils/git';

export interface ScanTarget {
  file: string;
  line: string;
  lineNumber: number;
  origin: ScanMode;
}

const BINARY_SNIFF_BYTES = 8 * 1024;

export const STAGED_DIFF_ARGS = [
  '-c',
  'core.quotePath=false',
  'diff',
  '--cached',
  '-U0',
  '--no-color',
  '--no-ext-diff',
  '--src-prefix=a/',
  '--dst-prefix=b/',
  '--diff-filter=ACM',
];

export function isBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * A path is excluded when it starts with one of the prefixes or contains it as
 * a nested directory (`packages/app/node_modules/...`).
 */
export function isExcludedPath(file: string, excludePaths: readonly string[]): boolean {
  const normalized = file.split(path.sep).join('/').replace(/^\.\//, '');
  return excludePaths.some((prefix) => {
    const clean = prefix.replace(/^\.\//, '');
    if (!clean) return false;
    return normalized.startsWith(clean) || (clean.endsWith('/') && normalized.includes(`/${clean}`));
  });
}

function diffPath(header: string): string | null {
  let value = header.slice(4).trim();
  if (value === '/dev/null') {
    return null;
  }
  if (value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1);
  }
  return value.startsWith('b/') ? value.slice(2) : value;
}

/**
 * Added lines of a zero-context unified diff, numbered from the `+c,d` side
 * of each hunk header.
 */
export function parseUnifiedDiff(diff: string): ScanTarget[] {
  const targets: ScanTarget[] = [];
  let file: string | null = null;
  let inHunk = false;
  let nextLine = 0;

  for (const line of diff.split('\n')) {
    if (line.startsWith('diff --git ')) {
      file = null;
      inHunk = false;
      continue;
    }
    if (!inHunk && line.startsWith('+++ ')) {
      file = diffPath(line);
      continue;
    }
    if (line.startsWith('@@')) {
      const match = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/.exec(line);
      inHunk = match !== null;
      nextLine = match ? Number.parseInt(match[1], 10) : 0;
      continue;
    }
    if (!inHunk || file === null) {
      continue;
    }
    if (line.startsWith('+')) {
      targets.push({ file, line: line.slice(1).replace(/\r$/, ''), lineNumber: nextLine, origin: 'staged' });
      nextLine += 1;
    } else if (line.startsWith(' ')) {
      nextLine += 1;
    }
  }

  return targets;
}

export async function collectStagedTargets(
  repoRoot: string,
  git: GitRunner,
  excludePaths: readonly string[],
): Promise<ScanTarget[]> {
  const diff = await git(STAGED_DIFF_ARGS, { cwd: repoRoot });
  return parseUnifiedDiff(diff).filter((target) => !isExcludedPath(target.file, excludePaths));
}

export async function collectFullTargets(
  repoRoot: string,
  git: GitRunner,
  excludePaths: readonly string[],
): Promise<ScanTarget[]> {
  const listing = await git(['ls-files', '-z'], { cwd: repoRoot });
  const files = listing
    .split('\0')
    .filter((file) => file.length > 0 && !isExcludedPath(file, excludePaths))
    .sort();

  const targets: ScanTarget[] = [];
  for (const file of files) {
    const absolute = path.join(repoRoot, file);
    let buffer: Buffer;
    try {
      const stat = await fs.promises.stat(absolute);
      if (!stat.isFile()) continue;
      buffer = await fs.promises.readFile(absolute);
    } catch {
      // tracked but deleted from the working tree
      continue;
    }
    if (isBinary(buffer)) continue;

    const lines = buffer.toString('utf-8').split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    lines.forEach((line, index) => {
      targets.push({ file, line, lineNumber: index + 1, origin: 'full' });
    });
  }
  return targets;
}
