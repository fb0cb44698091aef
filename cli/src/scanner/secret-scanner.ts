import path from 'path';
import chalk from 'chalk';
import type { PushGateConfig, ScanMode } from '../utils/config';
import { resolveConfigPaths } from '../utils/config';
import { ExitCode, type ExitStatus, OperationalError, describeError, exitCodeFor } from '../utils/errors';
import { type GitRunner, execGit } from '../utils/git';
import { Logger } from '../utils/logger';
import { type AllowlistRule, findAllowlistRule, loadAllowlist } from './allowlist';
import { SECRET_PATTERNS, type SecretCategory, type SecretPattern } from './patterns';
import { type ScanTarget, collectFullTargets, collectStagedTargets } from './sources';

export const REDACTION = '***REDACTED***';
const DISPLAY_LIMIT = 160;

const LOCK_FILE_NAMES = new Set([
  'package-lock.json',
  'npm-shrinkwrap.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'Cargo.lock',
  'poetry.lock',
  'Gemfile.lock',
  'composer.lock',
  'go.sum',
]);

export interface Finding {
  file: string;
  lineNumber: number;
  patternId: string;
  category: SecretCategory;
  redactedLine: string;
}

export function isLockFile(file: string): boolean {
  const base = path.posix.basename(file.split(path.sep).join('/'));
  return LOCK_FILE_NAMES.has(base) || base.endsWith('.lock');
}

const globalCopies = new WeakMap<RegExp, RegExp>();

function globalCopy(regex: RegExp): RegExp {
  let copy = globalCopies.get(regex);
  if (!copy) {
    copy = new RegExp(regex.source, regex.flags.includes('g') ? regex.flags : `${regex.flags}g`);
    globalCopies.set(regex, copy);
  }
  copy.lastIndex = 0;
  return copy;
}

/** Every occurrence of `pattern` in `line` whose captured value passes `accept`. */
export function findSecrets(line: string, pattern: SecretPattern): RegExpExecArray[] {
  const regex = globalCopy(pattern.regex);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(line)) !== null) {
    const secret = match.groups?.secret;
    if (secret && (!pattern.accept || pattern.accept(secret))) {
      matches.push(match);
    }
    if (match[0].length === 0) {
      regex.lastIndex += 1;
    }
  }
  return matches;
}

export function findSecret(line: string, pattern: SecretPattern): RegExpExecArray | null {
  return findSecrets(line, pattern)[0] ?? null;
}

type Span = readonly [start: number, end: number];

function secretSpan(match: RegExpExecArray): Span {
  return match.indices?.groups?.secret ?? [match.index, match.index + match[0].length];
}

/** Replaces each span with the redaction marker; overlapping or touching spans collapse into one. */
export function redactSpans(line: string, spans: readonly Span[]): string {
  const merged: [number, number][] = [];
  for (const [start, end] of [...spans].sort((a, b) => a[0] - b[0])) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }

  let result = line;
  for (let i = merged.length - 1; i >= 0; i -= 1) {
    const [start, end] = merged[i];
    result = `${result.slice(0, start)}${REDACTION}${result.slice(end)}`;
  }
  return result;
}

function display(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > DISPLAY_LIMIT ? trimmed.slice(0, DISPLAY_LIMIT) : trimmed;
}

export interface MatchOptions {
  patterns?: readonly SecretPattern[];
  allowlist?: readonly AllowlistRule[];
  redact?: boolean;
}

export function matchTarget(target: ScanTarget, options: MatchOptions = {}): Finding | null {
  const patterns = options.patterns ?? SECRET_PATTERNS;
  if (findAllowlistRule(target.line, options.allowlist ?? [])) {
    return null;
  }

  const lockFile = isLockFile(target.file);
  const applicable = patterns.filter((pattern) => !(lockFile && pattern.skipLockFiles));
  for (const pattern of applicable) {
    if (!findSecret(target.line, pattern)) {
      continue;
    }
    return {
      file: target.file,
      lineNumber: target.lineNumber,
      patternId: pattern.id,
      category: pattern.category,
      redactedLine: options.redact ? redactLine(target.line, applicable).trim() : display(target.line),
    };
  }
  return null;
}

/** Redacts every accepted match of every pattern, not just the one that named the finding. */
function redactLine(line: string, patterns: readonly SecretPattern[]): string {
  const spans = patterns.flatMap((pattern) => findSecrets(line, pattern).map(secretSpan));
  return redactSpans(line, spans);
}

export function scanTargets(targets: readonly ScanTarget[], options: MatchOptions = {}): Finding[] {
  const findings: Finding[] = [];
  for (const target of targets) {
    const finding = matchTarget(target, options);
    if (finding) {
      findings.push(finding);
    }
  }
  return findings;
}

export interface ScanOptions {
  repoRoot: string;
  mode: ScanMode;
  redact: boolean;
  config: PushGateConfig;
  git?: GitRunner;
  logger?: Logger;
  print?: (line: string) => void;
  banner?: boolean;
}

export interface ScanReport {
  mode: ScanMode;
  linesScanned: number;
  findings: Finding[];
}

export async function scanRepository(options: ScanOptions): Promise<ScanReport> {
  const git = options.git ?? execGit;
  const { allowlistPath } = resolveConfigPaths(options.repoRoot);
  const allowlist = await loadAllowlist(allowlistPath);
  const excludes = options.config.secret_scan.exclude_paths;

  let targets: ScanTarget[];
  try {
    targets =
      options.mode === 'staged'
        ? await collectStagedTargets(options.repoRoot, git, excludes)
        : await collectFullTargets(options.repoRoot, git, excludes);
  } catch (error: unknown) {
    throw new OperationalError(`Could not read ${options.mode} changes from git: ${describeError(error)}`);
  }

  return {
    mode: options.mode,
    linesScanned: targets.length,
    findings: scanTargets(targets, { allowlist, redact: options.redact }),
  };
}

export async function scan(options: ScanOptions): Promise<ExitStatus> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new Logger(options.repoRoot, 'scan');

  if (options.banner !== false) {
    print(chalk.cyan(`🔍 Scanning ${options.mode === 'staged' ? 'staged changes' : 'tracked files'} for secrets...`));
  }

  let report: ScanReport;
  try {
    report = await scanRepository(options);
  } catch (error: unknown) {
    logger.error(describeError(error));
    print(chalk.red(`✗ Secret scan could not run: ${describeError(error)}`));
    return exitCodeFor(error);
  }

  logger.info('Secret scan finished', {
    mode: report.mode,
    lines: report.linesScanned,
    findings: report.findings.length,
  });

  if (report.findings.length === 0) {
    print(chalk.green(`✓ No secrets found (${report.linesScanned} line(s) scanned)`));
    return ExitCode.Ok;
  }

  print(chalk.red(`✗ ${report.findings.length} potential secret(s) found:`));
  for (const finding of report.findings) {
    print(`  ${chalk.bold(`${finding.file}:${finding.lineNumber}`)} ${chalk.yellow(`[${finding.category}/${finding.patternId}]`)}`);
    print(`    ${finding.redactedLine}`);
  }
  print(chalk.gray('Remove the secret, or add a pattern to .pushgate/secret-allowlist.txt if it is a false positive.'));
  return ExitCode.Violations;
}
