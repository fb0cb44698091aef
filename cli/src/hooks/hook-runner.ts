import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { PinResolver } from '@pushgate/sdk';
import { checkLargeFiles } from '../checks/large-files';
import { autopin } from '../pinning/autopin';
import { resolverFromConfig } from '../pinning/resolver';
import { pincheck } from '../pinning/validator';
import { scan } from '../scanner/secret-scanner';
import { type PushGateConfig, loadConfig } from '../utils/config';
import { ExitCode, type ExitStatus, OperationalError } from '../utils/errors';
import { type GitRunner, execGit, getRepositoryRoot } from '../utils/git';
import { Logger } from '../utils/logger';
import { type HookStep, type StepResult, dispatch } from './dispatcher';

export interface HookContext {
  hook: string;
  args: string[];
  repoRoot: string;
  config: PushGateConfig;
  logger: Logger;
}

export interface HookRunnerOptions {
  cwd?: string;
  git?: GitRunner;
  /** Overrides the resolver built from `resolver:` config. */
  resolver?: PinResolver;
  print?: (line: string) => void;
}

export class HookRunner {
  private readonly print: (line: string) => void;
  private readonly git: GitRunner;

  constructor(private readonly options: HookRunnerOptions = {}) {
    this.print = options.print ?? ((line: string) => console.log(line));
    this.git = options.git ?? execGit;
  }

  async run(hookType: string, args: string[]): Promise<ExitStatus> {
    if (!hookType) {
      return ExitCode.Ok;
    }

    const cwd = this.options.cwd ?? process.cwd();
    const repoRoot = await getRepositoryRoot(cwd, this.git);
    if (!repoRoot) {
      throw new OperationalError(`${cwd} is not inside a git repository`);
    }

    const logger = new Logger(repoRoot, `hook:${hookType}`);
    const { config, warnings } = await loadConfig(repoRoot);
    for (const warning of warnings) {
      logger.warn(`config: ${warning}`);
    }

    const context: HookContext = { hook: hookType, args, repoRoot, config, logger };
    switch (hookType) {
      case 'pre-push':
        return this.handlePrePush(context);
      default:
        throw new OperationalError(`Unsupported hook: ${hookType}`);
    }
  }

  private async handlePrePush(context: HookContext): Promise<ExitStatus> {
    this.print(chalk.cyan('🛡️  pushgate: checking outgoing changes'));
    const result = await dispatch(this.prePushSteps(context), {
      print: this.print,
      logger: context.logger,
      action: 'push',
    });
    return result.exitCode;
  }

  prePushSteps(context: HookContext): HookStep[] {
    const { config, repoRoot, logger } = context;

    return [
      {
        name: 'secret-scan',
        run: async (): Promise<StepResult> => {
          if (!config.secret_scan.enabled) {
            return { skipped: true, detail: 'disabled in config' };
          }
          const exitCode = await scan({
            repoRoot,
            mode: config.secret_scan.mode,
            redact: config.secret_scan.redact,
            config,
            git: this.git,
            logger: logger.child('scan'),
            print: this.print,
          });
          return { exitCode, detail: `${config.secret_scan.mode} mode` };
        },
      },
      {
        name: 'workflow-pins',
        run: async (): Promise<StepResult> => {
          if (!config.pinning.enabled) {
            return { skipped: true, detail: 'disabled in config' };
          }
          const dir = path.resolve(repoRoot, config.pinning.workflows_dir);
          if (!fs.existsSync(dir)) {
            return { skipped: true, detail: `no ${config.pinning.workflows_dir} directory` };
          }

          const exitCode = await pincheck({ dir, print: this.print, logger: logger.child('pincheck') });
          if (exitCode !== ExitCode.Violations || !config.pinning.autopin) {
            return { exitCode };
          }

          const remediation = await autopin({
            dir,
            actions: config.pinning.actions,
            images: config.pinning.images,
            resolver: this.options.resolver ?? resolverFromConfig(config.resolver),
            print: this.print,
            logger: logger.child('autopin'),
          });
          if (remediation === ExitCode.Remediated) {
            return { exitCode: ExitCode.Violations, detail: 'pinned by autopin; commit the changes and push again' };
          }
          if (remediation === ExitCode.Ok) {
            return { exitCode: ExitCode.Violations, detail: 'autopin is off for the unpinned reference kinds' };
          }
          return { exitCode: ExitCode.Violations, detail: 'autopin could not pin every reference' };
        },
      },
      {
        name: 'large-files',
        run: async (): Promise<StepResult> => {
          if (!config.large_files.enabled) {
            return { skipped: true, detail: 'disabled in config' };
          }
          const exitCode = await checkLargeFiles({
            repoRoot,
            maxMb: config.large_files.max_mb,
            git: this.git,
            print: this.print,
            logger: logger.child('large-files'),
          });
          return { exitCode, detail: `limit ${config.large_files.max_mb} MiB` };
        },
      },
    ];
  }
}
