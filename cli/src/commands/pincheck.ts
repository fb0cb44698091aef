import path from 'path';
import chalk from 'chalk';
import { pincheck } from '../pinning/validator';
import { DEFAULT_CONFIG, type PushGateConfig, loadConfig } from '../utils/config';
import { type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { getRepositoryRoot } from '../utils/git';
import { Logger } from '../utils/logger';

export interface WorkflowContext {
  dir: string;
  config: PushGateConfig;
  logger: Logger;
}

/**
 * `--dir` wins; otherwise the configured workflow directory of the enclosing
 * repository, or `.github/workflows` under the current directory.
 */
export async function resolveWorkflowContext(scope: string, dir?: string): Promise<WorkflowContext> {
  const cwd = process.cwd();
  const repoRoot = await getRepositoryRoot(cwd);
  const logger = new Logger(repoRoot, scope);
  if (!repoRoot) {
    return { dir: path.resolve(cwd, dir ?? DEFAULT_CONFIG.pinning.workflows_dir), config: DEFAULT_CONFIG, logger };
  }

  const { config, warnings } = await loadConfig(repoRoot);
  warnings.forEach((warning) => logger.warn(`config: ${warning}`));
  return {
    dir: dir ? path.resolve(cwd, dir) : path.resolve(repoRoot, config.pinning.workflows_dir),
    config,
    logger,
  };
}

export class PincheckCommand {
  async run(options: { dir?: string; quiet?: boolean } = {}): Promise<ExitStatus> {
    try {
      const { dir, logger } = await resolveWorkflowContext('pincheck', options.dir);
      return await pincheck({ dir, quiet: options.quiet, logger });
    } catch (error: unknown) {
      console.error(chalk.red(`❌ ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }
}
