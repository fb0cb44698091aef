import fs from 'fs';
import path from 'path';
import { load as loadYaml, dump as dumpYaml, YAMLException } from 'js-yaml';
import { ConfigError } from './errors';

export const CONFIG_DIR_NAME = '.pushgate';
export const CONFIG_FILE_NAME = 'config.yml';
export const ALLOWLIST_FILE_NAME = 'secret-allowlist.txt';
export const MANIFEST_FILE_NAME = 'hooks-manifest.json';

export type ScanMode = 'staged' | 'full';

export interface SecretScanConfig {
  enabled: boolean;
  mode: ScanMode;
  redact: boolean;
  exclude_paths: string[];
}

export interface PinningConfig {
  enabled: boolean;
  workflows_dir: string;
  autopin: boolean;
  actions: boolean;
  images: boolean;
}

export interface LargeFilesConfig {
  enabled: boolean;
  max_mb: number;
}

export interface ResolverConfig {
  github_api_url: string;
  github_token?: string;
  timeout: number;
  retry_count: number;
}

export interface PushGateConfig {
  secret_scan: SecretScanConfig;
  pinning: PinningConfig;
  large_files: LargeFilesConfig;
  resolver: ResolverConfig;
}

export interface ConfigPaths {
  repoRoot: string;
  configDir: string;
  configPath: string;
  allowlistPath: string;
  manifestPath: string;
}

export const DEFAULT_EXCLUDE_PATHS = ['node_modules/', 'target/', 'dist/', 'build/', 'coverage/', 'vendor/', '.git/'];

export const DEFAULT_CONFIG: PushGateConfig = {
  secret_scan: {
    enabled: true,
    mode: 'staged',
    redact: true,
    exclude_paths: DEFAULT_EXCLUDE_PATHS,
  },
  pinning: {
    enabled: true,
    workflows_dir: '.github/workflows',
    autopin: false,
    actions: true,
    images: true,
  },
  large_files: {
    enabled: true,
    max_mb: 10,
  },
  resolver: {
    github_api_url: 'https://api.github.com',
    github_token: '${GITHUB_TOKEN:-}',
    timeout: 10000,
    retry_count: 3,
  },
};

export function resolveConfigPaths(repoRoot: string): ConfigPaths {
  const configDir = path.join(repoRoot, CONFIG_DIR_NAME);
  return {
    repoRoot,
    configDir,
    configPath: path.join(configDir, CONFIG_FILE_NAME),
    allowlistPath: path.join(configDir, ALLOWLIST_FILE_NAME),
    manifestPath: path.join(configDir, MANIFEST_FILE_NAME),
  };
}

export interface LoadedConfig {
  config: PushGateConfig;
  warnings: string[];
}

/**
 * Reads `.pushgate/config.yml` over the defaults. Unknown or mistyped values
 * fall back to the default and produce a warning; a file that is not YAML is
 * a ConfigError.
 */
export async function loadConfig(repoRoot: string): Promise<LoadedConfig> {
  const { configPath } = resolveConfigPaths(repoRoot);
  const warnings: string[] = [];
  let raw: unknown = {};

  if (fs.existsSync(configPath)) {
    const contents = await fs.promises.readFile(configPath, 'utf-8');
    try {
      raw = loadYaml(contents) ?? {};
    } catch (error: unknown) {
      const reason = error instanceof YAMLException ? error.reason : String(error);
      throw new ConfigError(configPath, `invalid YAML (${reason})`);
    }
    if (!isRecord(raw)) {
      throw new ConfigError(configPath, 'expected a mapping at the top level');
    }
  }

  const config = normalizeConfig(resolveEnvPlaceholders(raw), warnings);
  return { config, warnings };
}

export function renderConfig(config: PushGateConfig = DEFAULT_CONFIG): string {
  const header = '# pushgate configuration\n# Toggle controls with true/false. See `pushgate --help`.\n';
  return header + dumpYaml(config, { lineWidth: 120 });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: unknown, key: string, warnings: string[]): Record<string, unknown> {
  if (!isRecord(raw) || raw[key] === undefined) {
    return {};
  }
  const value = raw[key];
  if (!isRecord(value)) {
    warnings.push(`${key}: expected a mapping, using defaults`);
    return {};
  }
  return value;
}

function pick<T>(
  values: Record<string, unknown>,
  key: string,
  fallback: T,
  accept: (value: unknown) => value is T,
  warnings: string[],
  prefix: string,
): T {
  const value = values[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (!accept(value)) {
    warnings.push(`${prefix}.${key}: invalid value ${JSON.stringify(value)}, using ${JSON.stringify(fallback)}`);
    return fallback;
  }
  return value;
}

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';
const isNonEmptyString = (value: unknown): value is string => typeof value === 'string' && value.length > 0;
const isPositiveNumber = (value: unknown): value is number => typeof value === 'number' && value > 0;
const isScanMode = (value: unknown): value is ScanMode => value === 'staged' || value === 'full';
const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

export function normalizeConfig(raw: unknown, warnings: string[] = []): PushGateConfig {
  const defaults = DEFAULT_CONFIG;
  const scan = section(raw, 'secret_scan', warnings);
  const pinning = section(raw, 'pinning', warnings);
  const largeFiles = section(raw, 'large_files', warnings);
  const resolver = section(raw, 'resolver', warnings);

  const token = pick(
    resolver,
    'github_token',
    expandEnv(defaults.resolver.github_token ?? ''),
    isString,
    warnings,
    'resolver',
  );

  return {
    secret_scan: {
      enabled: pick(scan, 'enabled', defaults.secret_scan.enabled, isBoolean, warnings, 'secret_scan'),
      mode: pick(scan, 'mode', defaults.secret_scan.mode, isScanMode, warnings, 'secret_scan'),
      redact: pick(scan, 'redact', defaults.secret_scan.redact, isBoolean, warnings, 'secret_scan'),
      exclude_paths: pick(
        scan,
        'exclude_paths',
        [...defaults.secret_scan.exclude_paths],
        isStringList,
        warnings,
        'secret_scan',
      ),
    },
    pinning: {
      enabled: pick(pinning, 'enabled', defaults.pinning.enabled, isBoolean, warnings, 'pinning'),
      workflows_dir: pick(
        pinning,
        'workflows_dir',
        defaults.pinning.workflows_dir,
        isNonEmptyString,
        warnings,
        'pinning',
      ),
      autopin: pick(pinning, 'autopin', defaults.pinning.autopin, isBoolean, warnings, 'pinning'),
      actions: pick(pinning, 'actions', defaults.pinning.actions, isBoolean, warnings, 'pinning'),
      images: pick(pinning, 'images', defaults.pinning.images, isBoolean, warnings, 'pinning'),
    },
    large_files: {
      enabled: pick(largeFiles, 'enabled', defaults.large_files.enabled, isBoolean, warnings, 'large_files'),
      max_mb: pick(largeFiles, 'max_mb', defaults.large_files.max_mb, isPositiveNumber, warnings, 'large_files'),
    },
    resolver: {
      github_api_url: pick(
        resolver,
        'github_api_url',
        defaults.resolver.github_api_url,
        isNonEmptyString,
        warnings,
        'resolver',
      ),
      github_token: token || undefined,
      timeout: pick(resolver, 'timeout', defaults.resolver.timeout, isPositiveNumber, warnings, 'resolver'),
      retry_count: pick(resolver, 'retry_count', defaults.resolver.retry_count, isPositiveNumber, warnings, 'resolver'),
    },
  };
}

/** Expands `${VAR}` and `${VAR:-fallback}`. */
export function expandEnv(value: string): string {
  return value.replace(/\$\{([A-Z0-9_]+)(?::-(.*?))?}/g, (_, envVar: string, fallback?: string) => {
    const envValue = process.env[envVar];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return fallback ?? '';
  });
}

export function resolveEnvPlaceholders(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnv(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item));
  }

  if (isRecord(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      resolved[key] = resolveEnvPlaceholders(child);
    }
    return resolved;
  }

  return value;
}
