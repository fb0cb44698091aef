import chalk from 'chalk';
import { autopin } from '../pinning/autopin';
import { resolverFromConfig } from '../pinning/resolver';
import { type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { resolveWorkflowContext } from './pincheck';

export interface AutopinCommandOptions {
  dir?: string;
  actions?: boolean;
  images?: boolean;
  quiet?: boolean;
}

export class AutopinCommand {
  async run(options: AutopinCommandOptions = {}): Promise<ExitStatus> {
    try {
      const { dir, config, logger } = await resolveWorkflowContext('autopin', options.dir);
      return await autopin({
        dir,
        actions: options.actions,
        images: options.images,
        resolver: resolverFromConfig(config.resolver),
        quiet: options.quiet,
        logger,
      });
    } catch (error: unknown) {
      console.error(chalk.red(`❌ ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }
}
