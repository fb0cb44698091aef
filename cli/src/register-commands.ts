import { Command, Option } from 'commander';
import type { ScanMode } from './utils/config';

export function registerCommands(program: Command) {
  // ─────────────────────────────────────────────────────────────────
  // CHECKS
  // ─────────────────────────────────────────────────────────────────

  program
    .command('scan')
    .description('Scan staged changes (or all tracked files) for secrets')
    .addOption(new Option('--mode <mode>', 'What to scan').choices(['staged', 'full']))
    .option('--redact', 'Replace matched secret values with ***REDACTED*** in the output')
    .option('--no-banner', 'Do not print the scan banner')
    .action(async (options: { mode?: ScanMode; redact?: boolean; banner: boolean }) => {
      const { ScanCommand } = await import('./commands/scan');
      process.exitCode = await new ScanCommand().run({
        mode: options.mode,
        redact: options.redact,
        banner: options.banner,
      });
    });

  program
    .command('pincheck')
    .description('Verify every workflow action and container image is pinned')
    .option('--dir <path>', 'Workflow directory (default: .github/workflows)')
    .option('-q, --quiet', 'Only print violations')
    .action(async (options: { dir?: string; quiet?: boolean }) => {
      const { PincheckCommand } = await import('./commands/pincheck');
      process.exitCode = await new PincheckCommand().run(options);
    });

  program
    .command('autopin')
    .description('Rewrite floating workflow references to commit SHAs and image digests')
    .option('--dir <path>', 'Workflow directory (default: .github/workflows)')
    .option('--actions', 'Pin actions')
    .option('--images', 'Pin container and service images')
    .option('-q, --quiet', 'Only print failures')
    .action(async (options: { dir?: string; actions?: boolean; images?: boolean; quiet?: boolean }) => {
      const { AutopinCommand } = await import('./commands/autopin');
      process.exitCode = await new AutopinCommand().run(options);
    });

  // ─────────────────────────────────────────────────────────────────
  // REPOSITORY SETUP
  // ─────────────────────────────────────────────────────────────────

  program
    .command('install')
    .description('Install the pushgate pre-push hook in the current repository')
    .option('--force', 'Replace an existing hook without asking (it is backed up)')
    .option('--no-gitignore', 'Do not add pushgate entries to .gitignore')
    .action(async (options: { force?: boolean; gitignore: boolean }) => {
      const { InstallCommand } = await import('./commands/install');
      process.exitCode = await new InstallCommand().run(options);
    });

  program
    .command('uninstall')
    .description('Remove pushgate hooks and restore the hooks they replaced')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: { yes?: boolean }) => {
      const { UninstallCommand } = await import('./commands/uninstall');
      process.exitCode = await new UninstallCommand().run(options);
    });

  program
    .command('hook')
    .description('Internal: run a git hook (invoked by the installed hook script)')
    .argument('<name>', 'Hook name, e.g. pre-push')
    .argument('[args...]', 'Arguments git passed to the hook')
    .action(async (name: string, args: string[] = []) => {
      const { HookCommand } = await import('./commands/hook');
      process.exitCode = await new HookCommand().run(name, args);
    });
}
