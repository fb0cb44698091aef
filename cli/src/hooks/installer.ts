import fs from 'fs';
import path from 'path';
import { withTransaction, type ScopedTransactionOptions } from '../transaction/transaction';
import { renderConfig, resolveConfigPaths } from '../utils/config';
import { OperationalError } from '../utils/errors';
import { renderGitignore } from '../utils/gitignore';
import { Logger } from '../utils/logger';
import { getCliVersion } from '../version';

export const HOOK_MARKER = 'pushgate pre-push hook';
export const DISPATCHER_MARKER = 'pushgate hook dispatcher';
export const DEFAULT_HOOKS = ['pre-push'];

/** Name of the pushgate entry inside a `<hook>.d/` chain directory. */
const CHAIN_ENTRY_PREFIX = '50-pushgate-';

const ALLOWLIST_TEMPLATE = `# pushgate secret allowlist
# One regular expression per line. A line matching any of them is never
# reported by the secret scanner.
`;

export interface HookManifestEntry {
  name: string;
  target: string;
  backup?: string;
  /** Dispatcher pushgate created to run the `<hook>.d/` chain. */
  dispatcher?: string;
}

export interface HookManifest {
  version: string;
  installedAt: string;
  hooks: HookManifestEntry[];
}

export interface InstallHooksOptions {
  repoRoot: string;
  gitDir: string;
  /** Directory git runs hooks from (`git rev-parse --git-path hooks`); defaults to `<gitDir>/hooks`. */
  hooksDir?: string;
  hooks?: string[];
  force?: boolean;
  gitignore?: boolean;
  /** Asked before replacing a hook pushgate did not write. */
  confirmReplace?: (hookPath: string) => Promise<boolean>;
  logger?: Logger;
  transaction?: ScopedTransactionOptions;
}

export interface InstallHooksResult {
  installed: HookManifestEntry[];
  created: string[];
  warnings: string[];
}

export interface UninstallHooksResult {
  removed: string[];
  restored: string[];
}

interface HookPlan {
  name: string;
  target: string;
  content: string;
  foreign: boolean;
  previousBackup?: string;
  /** Set when the hooks directory has no `<hook>` entry that runs the chain yet. */
  dispatcher?: { path: string; content: string };
  previousDispatcher?: string;
}

export function renderTemplate(template: string, version = getCliVersion(), hook = ''): string {
  return template.replace(/\{\{VERSION\}\}/g, version).replace(/\{\{HOOK\}\}/g, hook);
}

export function isOwnHook(content: string): boolean {
  return content.includes(HOOK_MARKER);
}

/**
 * A hooks directory other than `<gitDir>/hooks` (core.hooksPath, usually
 * owned by a hook manager) gets a chained `<hook>.d/50-pushgate-<hook>`
 * entry instead of taking over `<hook>` itself.
 */
export function isChainedLayout(gitDir: string, hooksDir: string): boolean {
  return path.resolve(hooksDir) !== path.resolve(gitDir, 'hooks');
}

export function hookTarget(gitDir: string, hooksDir: string, name: string): string {
  return isChainedLayout(gitDir, hooksDir)
    ? path.join(hooksDir, `${name}.d`, `${CHAIN_ENTRY_PREFIX}${name}`)
    : path.join(hooksDir, name);
}

async function readTemplate(name: string): Promise<string> {
  const templatePath = path.join(__dirname, 'templates', name);
  if (!fs.existsSync(templatePath)) {
    throw new OperationalError(`Hook template not found: ${name}`);
  }
  return fs.promises.readFile(templatePath, 'utf-8');
}

function getManifestPath(repoRoot: string): string {
  return resolveConfigPaths(repoRoot).manifestPath;
}

function isManifestEntry(value: unknown): value is HookManifestEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'target' in value &&
    typeof value.target === 'string' &&
    (!('backup' in value) || value.backup === undefined || typeof value.backup === 'string') &&
    (!('dispatcher' in value) || value.dispatcher === undefined || typeof value.dispatcher === 'string')
  );
}

export async function loadManifest(repoRoot: string): Promise<HookManifest | null> {
  const manifestPath = getManifestPath(repoRoot);
  if (!fs.existsSync(manifestPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(await fs.promises.readFile(manifestPath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || !('hooks' in parsed) || !Array.isArray(parsed.hooks)) {
      return null;
    }
    const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    const installedAt = 'installedAt' in parsed && typeof parsed.installedAt === 'string' ? parsed.installedAt : '';
    return { version, installedAt, hooks: parsed.hooks.filter(isManifestEntry) };
  } catch {
    return null;
  }
}

async function planHooks(
  options: InstallHooksOptions,
  manifest: HookManifest | null,
  warnings: string[],
): Promise<HookPlan[]> {
  const hooksDir = options.hooksDir ?? path.join(options.gitDir, 'hooks');
  const chained = isChainedLayout(options.gitDir, hooksDir);
  const plans: HookPlan[] = [];
  for (const name of options.hooks ?? DEFAULT_HOOKS) {
    const template = await readTemplate(name);
    const target = hookTarget(options.gitDir, hooksDir, name);

    let foreign = false;
    if (fs.existsSync(target)) {
      const current = await fs.promises.readFile(target, 'utf-8');
      foreign = !isOwnHook(current);
    }
    if (foreign && !options.force) {
      const confirmed = options.confirmReplace ? await options.confirmReplace(target) : false;
      if (!confirmed) {
        throw new OperationalError(`${target} already exists and was not written by pushgate (use --force to replace it)`);
      }
    }

    const previous = manifest?.hooks.find((entry) => entry.name === name);
    const plan: HookPlan = { name, target, content: renderTemplate(template), foreign, previousBackup: previous?.backup };

    if (chained) {
      const entryPoint = path.join(hooksDir, name);
      if (!fs.existsSync(entryPoint)) {
        plan.dispatcher = { path: entryPoint, content: renderTemplate(await readTemplate('dispatcher'), undefined, name) };
      } else {
        const current = await fs.promises.readFile(entryPoint, 'utf-8');
        if (current.includes(DISPATCHER_MARKER)) {
          plan.previousDispatcher = previous?.dispatcher;
        } else if (!current.includes(`${name}.d`)) {
          warnings.push(`${entryPoint} does not run ${name}.d/; call ${target} from it`);
        }
      }
    }
    plans.push(plan);
  }
  return plans;
}

/**
 * Writes config, allowlist, `.gitignore` entries, hook scripts and the
 * manifest in one transaction. A replaced foreign hook keeps its backup so
 * uninstall can restore it.
 */
export async function installHooks(options: InstallHooksOptions): Promise<InstallHooksResult> {
  const logger = options.logger ?? new Logger(options.repoRoot, 'install');
  const paths = resolveConfigPaths(options.repoRoot);
  const manifest = await loadManifest(options.repoRoot);
  const warnings: string[] = [];
  const plans = await planHooks(options, manifest, warnings);
  for (const warning of warnings) {
    logger.warn(warning);
  }

  return withTransaction(
    'install',
    async (tx) => {
      const created: string[] = [];

      if (!fs.existsSync(paths.configPath)) {
        tx.atomicWrite(paths.configPath, renderConfig());
        created.push(paths.configPath);
      }
      if (!fs.existsSync(paths.allowlistPath)) {
        tx.atomicWrite(paths.allowlistPath, ALLOWLIST_TEMPLATE);
        created.push(paths.allowlistPath);
      }

      if (options.gitignore !== false) {
        const gitignorePath = path.join(options.repoRoot, '.gitignore');
        const current = fs.existsSync(gitignorePath) ? await fs.promises.readFile(gitignorePath, 'utf-8') : null;
        const updated = renderGitignore(current);
        if (updated !== null) {
          tx.atomicWrite(gitignorePath, updated);
        }
      }

      const installed: HookManifestEntry[] = [];
      for (const plan of plans) {
        const operation = tx.atomicWrite(plan.target, plan.content, { mode: 0o755, keepBackup: plan.foreign });
        const backup = plan.foreign ? operation.previousSnapshot : plan.previousBackup;
        if (plan.dispatcher) {
          tx.atomicWrite(plan.dispatcher.path, plan.dispatcher.content, { mode: 0o755 });
        }
        const dispatcher = plan.dispatcher?.path ?? plan.previousDispatcher;
        installed.push({ name: plan.name, target: plan.target, backup, dispatcher });
        logger.info(`Installed ${plan.name} hook`, { target: plan.target, backup, dispatcher });
      }

      const updatedManifest: HookManifest = {
        version: getCliVersion(),
        installedAt: new Date().toISOString(),
        hooks: installed,
      };
      tx.atomicWrite(paths.manifestPath, `${JSON.stringify(updatedManifest, null, 2)}\n`);

      return { installed, created, warnings };
    },
    { logger, ...options.transaction },
  );
}

/** Removes installed hooks, restores the hooks they replaced and drops the manifest. */
export async function uninstallHooks(
  repoRoot: string,
  gitDir: string,
  options: { hooksDir?: string; logger?: Logger; transaction?: ScopedTransactionOptions } = {},
): Promise<UninstallHooksResult> {
  const logger = options.logger ?? new Logger(repoRoot, 'uninstall');
  const manifest = await loadManifest(repoRoot);
  const hooksDir = options.hooksDir ?? path.join(gitDir, 'hooks');
  const entries: HookManifestEntry[] =
    manifest?.hooks ?? DEFAULT_HOOKS.map((name) => ({ name, target: hookTarget(gitDir, hooksDir, name) }));
  const manifestPath = getManifestPath(repoRoot);

  return withTransaction(
    'uninstall',
    async (tx) => {
      const removed: string[] = [];
      const restored: string[] = [];

      for (const entry of entries) {
        const chainDir = path.dirname(entry.target);
        const otherChained =
          entry.dispatcher && fs.existsSync(chainDir)
            ? fs.readdirSync(chainDir).filter((file) => file !== path.basename(entry.target))
            : [];

        if (fs.existsSync(entry.target)) {
          const content = await fs.promises.readFile(entry.target, 'utf-8');
          if (isOwnHook(content)) {
            tx.atomicRemove(entry.target);
            removed.push(entry.target);
          }
        }
        if (entry.backup && fs.existsSync(entry.backup) && !fs.existsSync(entry.target)) {
          tx.atomicMove(entry.backup, entry.target);
          restored.push(entry.target);
        }

        // The dispatcher goes only once nothing else is left in the chain.
        if (entry.dispatcher && otherChained.length === 0 && !fs.existsSync(entry.target) && fs.existsSync(entry.dispatcher)) {
          const content = await fs.promises.readFile(entry.dispatcher, 'utf-8');
          if (content.includes(DISPATCHER_MARKER)) {
            tx.atomicRemove(entry.dispatcher);
            removed.push(entry.dispatcher);
          }
        }
      }

      if (fs.existsSync(manifestPath)) {
        tx.atomicRemove(manifestPath);
      }
      logger.info('Uninstalled hooks', { removed, restored });
      return { removed, restored };
    },
    { logger, ...options.transaction },
  );
}
