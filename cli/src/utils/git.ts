import { execFile } from 'child_process';
import { promisify } from 'util';
import path from 'path';
import { OperationalError } from './errors';

const execFileAsync = promisify(execFile);

// Full-tree diffs of large repositories exceed the 1 MiB default.
const GIT_MAX_BUFFER = 256 * 1024 * 1024;

export interface GitEnvironmentInfo {
  repoRoot: string;
  gitDir: string;
  /** Where git looks for hooks; differs from `<gitDir>/hooks` when core.hooksPath is set. */
  hooksDir: string;
}

/**
 * Runs git and resolves with stdout. Scanners take one of these so tests can
 * substitute canned output.
 */
export type GitRunner = (args: string[], options?: { cwd?: string }) => Promise<string>;

export async function execGit(args: string[], options: { cwd?: string } = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const { stdout } = await execFileAsync('git', args, { cwd, maxBuffer: GIT_MAX_BUFFER, encoding: 'utf-8' });
  return stdout;
}

export async function getRepositoryRoot(cwd = process.cwd(), git: GitRunner = execGit): Promise<string | null> {
  try {
    const output = await git(['rev-parse', '--show-toplevel'], { cwd });
    return output.trim();
  } catch {
    return null;
  }
}

export async function getGitDir(cwd = process.cwd()): Promise<string | null> {
  try {
    const output = await execGit(['rev-parse', '--git-dir'], { cwd });
    return path.resolve(cwd, output.trim());
  } catch {
    return null;
  }
}

export async function getHooksDir(repoRoot: string, git: GitRunner = execGit): Promise<string | null> {
  try {
    const output = await git(['rev-parse', '--git-path', 'hooks'], { cwd: repoRoot });
    return path.resolve(repoRoot, output.trim());
  } catch {
    return null;
  }
}

export async function getGitInfo(cwd = process.cwd()): Promise<GitEnvironmentInfo | null> {
  const repoRoot = await getRepositoryRoot(cwd);
  if (!repoRoot) {
    return null;
  }

  const gitDir = await getGitDir(repoRoot);
  if (!gitDir) {
    return null;
  }

  const hooksDir = (await getHooksDir(repoRoot)) ?? path.join(gitDir, 'hooks');
  return { repoRoot, gitDir, hooksDir };
}

export async function requireGitInfo(cwd = process.cwd()): Promise<GitEnvironmentInfo> {
  const info = await getGitInfo(cwd);
  if (!info) {
    throw new OperationalError(`${cwd} is not inside a git repository`);
  }
  return info;
}
