import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { checkLargeFiles, findLargeFiles, formatSize } from '../../src/checks/large-files';
import type { GitRunner } from '../../src/utils/git';
import { Logger } from '../../src/utils/logger';

const MIB = 1024 * 1024;

describe('large file check', () => {
  let repoRoot: string;
  let output: string[];
  const logger = new Logger(null, 'test', false);
  const print = (line: string) => output.push(line);
  const git: GitRunner = async () => 'big.bin\0exact.bin\0small.txt\0gone.txt\0';

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'pushgate-large-'));
    output = [];
    fs.writeFileSync(path.join(repoRoot, 'big.bin'), Buffer.alloc(MIB + 1));
    fs.writeFileSync(path.join(repoRoot, 'exact.bin'), Buffer.alloc(MIB));
    fs.writeFileSync(path.join(repoRoot, 'small.txt'), 'hello\n');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  it('reports tracked files strictly larger than the limit', async () => {
    expect(await findLargeFiles(repoRoot, git, MIB)).toEqual([{ file: 'big.bin', bytes: MIB + 1 }]);
  });

  it('exits 1 and lists the offending files', async () => {
    expect(await checkLargeFiles({ repoRoot, maxMb: 1, git, print, logger })).toBe(1);
    expect(output[1]).toContain('big.bin');
    expect(output[1]).toContain('1.0 MiB');
  });

  it('exits 0 under a higher limit', async () => {
    expect(await checkLargeFiles({ repoRoot, maxMb: 2, git, print, logger })).toBe(0);
  });

  it('exits 3 when git cannot list files', async () => {
    const failing: GitRunner = async () => {
      throw new Error('fatal: not a git repository');
    };
    expect(await checkLargeFiles({ repoRoot, maxMb: 1, git: failing, print, logger })).toBe(3);
  });

  it('formats sizes in MiB', () => {
    expect(formatSize(15 * MIB + MIB / 2)).toBe('15.5 MiB');
  });
});
