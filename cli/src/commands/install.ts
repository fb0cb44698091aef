import chalk from 'chalk';
import inquirer from 'inquirer';
import { installHooks } from '../hooks/installer';
import { ExitCode, type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { requireGitInfo } from '../utils/git';
import { Logger } from '../utils/logger';

export interface InstallOptions {
  force?: boolean;
  gitignore?: boolean;
}

export class InstallCommand {
  async run(options: InstallOptions = {}): Promise<ExitStatus> {
    try {
      const gitInfo = await requireGitInfo();
      console.log(chalk.cyan('\n🛡️  pushgate install\n'));

      const result = await installHooks({
        repoRoot: gitInfo.repoRoot,
        gitDir: gitInfo.gitDir,
        hooksDir: gitInfo.hooksDir,
        force: options.force,
        gitignore: options.gitignore,
        confirmReplace: (hookPath) => this.confirmReplace(hookPath),
        logger: new Logger(gitInfo.repoRoot, 'install'),
      });

      for (const file of result.created) {
        console.log(chalk.gray(`   created ${file}`));
      }
      for (const hook of result.installed) {
        console.log(chalk.green(`✅ ${hook.name} hook installed at ${hook.target}`));
        if (hook.backup) {
          console.log(chalk.gray(`   previous hook saved to ${hook.backup}`));
        }
        if (hook.dispatcher) {
          console.log(chalk.gray(`   run through the dispatcher at ${hook.dispatcher}`));
        }
      }
      for (const warning of result.warnings) {
        console.log(chalk.yellow(`⚠️  ${warning}`));
      }
      console.log(chalk.gray('\n💡 Edit .pushgate/config.yml to toggle checks. Remove with: pushgate uninstall'));
      return ExitCode.Ok;
    } catch (error: unknown) {
      console.error(chalk.red(`❌ ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }

  private async confirmReplace(hookPath: string): Promise<boolean> {
    const { replace } = await inquirer.prompt<{ replace: boolean }>([
      {
        type: 'confirm',
        name: 'replace',
        message: `${hookPath} already exists. Back it up and replace it?`,
        default: false,
      },
    ]);
    return replace;
  }
}
