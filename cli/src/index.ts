#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './register-commands';
import { getCliVersion } from './version';

const program = new Command();
program
  .name('pushgate')
  .description('Pre-push security gate: secret scanning and workflow pinning')
  .version(getCliVersion(), '-v, --version', 'Show CLI version');

registerCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 3;
});
