import chalk from 'chalk';
import inquirer from 'inquirer';
import Table from 'cli-table3';
import { uninstallHooks } from '../hooks/installer';
import { ExitCode, type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { requireGitInfo } from '../utils/git';
import { Logger, readLogEntries } from '../utils/logger';

export class UninstallCommand {
  async run(options: { yes?: boolean } = {}): Promise<ExitStatus> {
    try {
      const gitInfo = await requireGitInfo();
      await this.showStatistics(gitInfo.repoRoot);

      if (!options.yes) {
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: 'Remove pushgate hooks and restore backups?',
            default: false,
          },
        ]);
        if (!confirm) {
          console.log(chalk.yellow('pushgate uninstall cancelled.'));
          return ExitCode.Ok;
        }
      }

      const result = await uninstallHooks(gitInfo.repoRoot, gitInfo.gitDir, {
        hooksDir: gitInfo.hooksDir,
        logger: new Logger(gitInfo.repoRoot, 'uninstall'),
      });
      for (const hook of result.removed) {
        console.log(chalk.green(`✅ removed ${hook}`));
      }
      for (const hook of result.restored) {
        console.log(chalk.green(`✅ restored previous hook at ${hook}`));
      }
      if (result.removed.length === 0 && result.restored.length === 0) {
        console.log(chalk.gray('No pushgate hooks were installed.'));
      }
      console.log(chalk.gray('\n💡 .pushgate/config.yml and the allowlist were kept. To reinstall: pushgate install'));
      return ExitCode.Ok;
    } catch (error: unknown) {
      console.error(chalk.red(`❌ ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }

  private async showStatistics(repoRoot: string): Promise<void> {
    const entries = await readLogEntries(repoRoot);
    if (entries.length === 0) {
      return;
    }

    const count = (message: string) =>
      entries.filter((entry) => typeof entry.message === 'string' && entry.message.startsWith(message)).length;

    const summaryTable = new Table({
      head: ['Metric', 'Count'],
      style: { head: ['cyan'] },
    });
    summaryTable.push(
      ['Secret scans', chalk.bold(String(count('Secret scan finished')))],
      ['Pin checks', chalk.bold(String(count('Pin check finished')))],
      ['Autopin runs', chalk.bold(String(count('Autopin finished')))],
      ['Rolled back transactions', chalk.yellow(String(count('Rolling back transaction')))],
    );
    console.log(chalk.cyan('\n📊 pushgate activity in this repository\n'));
    console.log(summaryTable.toString());
  }
}
