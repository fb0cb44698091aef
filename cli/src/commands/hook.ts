import chalk from 'chalk';
import { HookRunner } from '../hooks/hook-runner';
import { type ExitStatus, describeError, exitCodeFor } from '../utils/errors';

export class HookCommand {
  async run(hook: string, forwarded: string[]): Promise<ExitStatus> {
    try {
      return await new HookRunner().run(hook, forwarded);
    } catch (error: unknown) {
      console.error(chalk.red(`pushgate hook error: ${describeError(error)}`));
      return exitCodeFor(error);
    }
  }
}
