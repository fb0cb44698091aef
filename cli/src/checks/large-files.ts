import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { ExitCode, type ExitStatus, OperationalError, describeError, exitCodeFor } from '../utils/errors';
import { type GitRunner, execGit } from '../utils/git';
import { Logger } from '../utils/logger';

const MIB = 1024 * 1024;

export interface LargeFile {
  file: string;
  bytes: number;
}

export interface LargeFileCheckOptions {
  repoRoot: string;
  maxMb: number;
  git?: GitRunner;
  print?: (line: string) => void;
  logger?: Logger;
}

export function formatSize(bytes: number): string {
  return `${(bytes / MIB).toFixed(1)} MiB`;
}

export async function findLargeFiles(repoRoot: string, git: GitRunner, maxBytes: number): Promise<LargeFile[]> {
  let listing: string;
  try {
    listing = await git(['ls-files', '-z'], { cwd: repoRoot });
  } catch (error: unknown) {
    throw new OperationalError(`Could not list tracked files: ${describeError(error)}`);
  }

  const large: LargeFile[] = [];
  for (const file of listing.split('\0').filter(Boolean).sort()) {
    try {
      const stat = await fs.promises.stat(path.join(repoRoot, file));
      if (stat.isFile() && stat.size > maxBytes) {
        large.push({ file, bytes: stat.size });
      }
    } catch {
      // deleted from the working tree
    }
  }
  return large;
}

export async function checkLargeFiles(options: LargeFileCheckOptions): Promise<ExitStatus> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new Logger(options.repoRoot, 'large-files');

  let large: LargeFile[];
  try {
    large = await findLargeFiles(options.repoRoot, options.git ?? execGit, options.maxMb * MIB);
  } catch (error: unknown) {
    logger.error(describeError(error));
    print(chalk.red(`✗ Large-file check could not run: ${describeError(error)}`));
    return exitCodeFor(error);
  }

  if (large.length === 0) {
    print(chalk.green(`✓ No tracked file exceeds ${options.maxMb} MiB`));
    return ExitCode.Ok;
  }

  logger.warn('Large files found', { files: large.map((entry) => entry.file) });
  print(chalk.red(`✗ ${large.length} file(s) exceed ${options.maxMb} MiB:`));
  for (const entry of large) {
    print(`  ${chalk.bold(entry.file)} ${formatSize(entry.bytes)}`);
  }
  print(chalk.gray('Use Git LFS or remove the file(s) from the commit.'));
  return ExitCode.Violations;
}
