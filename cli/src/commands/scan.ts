import chalk from 'chalk';
import { scan } from '../scanner/secret-scanner';
import { type ScanMode, loadConfig } from '../utils/config';
import { type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { requireGitInfo } from '../utils/git';
import { Logger } from '../utils/logger';

export interface ScanCommandOptions {
  mode?: ScanMode;
  redact?: boolean;
  banner?: boolean;
}

export class ScanCommand {
  async run(options: ScanCommandOptions = {}): Promise<ExitStatus> {
    try {
      const { repoRoot } = await requireGitInfo();
      const logger = new Logger(repoRoot, 'scan');
      const { config, warnings } = await loadConfig(repoRoot);
      warnings.forEach((warning) => logger.warn(`config: ${warning}`));

      return await scan({
        repoRoot,
        mode: options.mode ?? config.secret_scan.mode,
        redact: options.redact ?? config.secret_scan.redact,
        config,
        logger,
        banner: options.banner,
      });
    } catch (error: unknown) {
      console.error(chalk.red(`❌ ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }
}
