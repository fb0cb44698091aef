import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  event: string;
  ts?: string;
  level?: LogLevel;
  [key: string]: unknown;
}

export function getPushGateHome(): string {
  return process.env.PUSHGATE_HOME || path.join(os.homedir(), '.pushgate');
}

/**
 * Logs live outside the repository (~/.pushgate/logs/<hash>/) so a rollback
 * or `git clean` never removes them.
 */
export function getLogDir(repoRoot: string): string {
  const hash = crypto.createHash('md5').update(repoRoot).digest('hex').slice(0, 12);
  return path.join(getPushGateHome(), 'logs', hash);
}

function getLogFile(repoRoot: string): string {
  return path.join(getLogDir(repoRoot), 'operations.log');
}

function serialize(entry: LogEntry): string {
  return `${JSON.stringify({ ts: entry.ts ?? new Date().toISOString(), ...entry })}\n`;
}

/** Appends one JSON line synchronously; exit handlers log through this too. */
export function logOperation(repoRoot: string, entry: LogEntry): void {
  try {
    fs.mkdirSync(getLogDir(repoRoot), { recursive: true });
    fs.appendFileSync(getLogFile(repoRoot), serialize(entry), 'utf-8');
  } catch {
    /* ignore logging errors */
  }
}

export async function readLogEntries(repoRoot: string): Promise<LogEntry[]> {
  const logFile = getLogFile(repoRoot);
  if (!fs.existsSync(logFile)) {
    return [];
  }

  const lines = (await fs.promises.readFile(logFile, 'utf-8')).split(/\r?\n/);
  const entries: LogEntry[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (parsed && typeof parsed === 'object' && 'event' in parsed && typeof parsed.event === 'string') {
        entries.push({ ...parsed, event: parsed.event });
        continue;
      }
    } catch {
      // fall through to the raw entry
    }
    entries.push({ ts: new Date().toISOString(), event: 'raw', message: line });
  }
  return entries;
}

export function isVerbose(): boolean {
  return process.env.PUSHGATE_VERBOSE === '1' || process.env.PUSHGATE_VERBOSE === 'true';
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Diagnostic logger: every record goes to the operations log; warnings and
 * errors (and everything when verbose) are echoed to stderr.
 */
export class Logger {
  constructor(
    private readonly repoRoot: string | null,
    private readonly scope: string,
    private readonly verbose = isVerbose(),
  ) {}

  child(scope: string): Logger {
    return new Logger(this.repoRoot, `${this.scope}:${scope}`, this.verbose);
  }

  debug(message: string, context: Record<string, unknown> = {}): void {
    this.write('debug', message, context);
  }

  info(message: string, context: Record<string, unknown> = {}): void {
    this.write('info', message, context);
  }

  warn(message: string, context: Record<string, unknown> = {}): void {
    this.write('warn', message, context);
  }

  error(message: string, context: Record<string, unknown> = {}): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: Record<string, unknown>): void {
    if (this.repoRoot) {
      logOperation(this.repoRoot, { event: 'log', level, scope: this.scope, message, ...context });
    }
    if (this.verbose || level === 'warn' || level === 'error') {
      const time = new Date().toTimeString().slice(0, 8);
      process.stderr.write(`${LEVEL_STYLE[level](`[${time}] [${level.toUpperCase()}]`)} ${message}\n`);
    }
  }
}
