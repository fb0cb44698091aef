export type SecretCategory =
  | 'cloud-credential'
  | 'forge-token'
  | 'platform-token'
  | 'payment-key'
  | 'chat-token'
  | 'webhook'
  | 'private-key'
  | 'bearer-token'
  | 'database-url'
  | 'generic-assignment';

export interface SecretPattern {
  readonly id: string;
  readonly category: SecretCategory;
  /** Must carry the `d` flag and a named group `secret` around the redactable value. */
  readonly regex: RegExp;
  /** Lock files are full of integrity hashes, so the loose patterns skip them. */
  readonly skipLockFiles: boolean;
  readonly accept?: (secret: string) => boolean;
}

const PLACEHOLDER_MARKERS =
  /example|placeholder|your[_-]?|changeme|change[_-]me|dummy|sample|redacted|removed|insert|replace|xxxx|\*\*\*|<|>|\$\{|\{\{|%\(/i;

const ENVIRONMENT_LOOKUP = /^(?:process\.env|os\.environ|env\.|ENV\[)/;

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_MARKERS.test(value) || ENVIRONMENT_LOOKUP.test(value) || /^(.)\1+$/.test(value);
}

export function mixesLettersAndDigits(value: string): boolean {
  return /[A-Za-z]/.test(value) && /[0-9]/.test(value);
}

const notPlaceholder = (value: string): boolean => !isPlaceholder(value);
const looksGenerated = (value: string): boolean => mixesLettersAndDigits(value) && !isPlaceholder(value);

const CREDENTIAL_KEY =
  '[A-Za-z0-9_.-]*(?:api[_-]?key|apikey|secret|token|passw(?:or)?d|pwd|credential|private[_-]?key|access[_-]?key)[A-Za-z0-9_.-]*';

/** Checked in order; the first pattern that matches a line decides its Finding. */
export const SECRET_PATTERNS: readonly SecretPattern[] = Object.freeze([
  {
    id: 'aws-access-key-id',
    category: 'cloud-credential',
    regex: /\b(?<secret>(?:A3T[A-Z0-9]|AKIA|ASIA|ABIA|ACCA)[A-Z0-9]{16})\b/d,
    skipLockFiles: false,
    accept: notPlaceholder,
  },
  {
    id: 'aws-secret-access-key',
    category: 'cloud-credential',
    regex: /aws[_-]?secret[_-]?access[_-]?key["']?\s*[:=]\s*["']?(?<secret>[A-Za-z0-9/+=]{40,})/di,
    skipLockFiles: false,
    accept: notPlaceholder,
  },
  {
    id: 'github-token',
    category: 'forge-token',
    regex: /\b(?<secret>(?:ghp|gho|ghu|ghs|ghr)_[0-9A-Za-z]{36})\b/d,
    skipLockFiles: false,
  },
  {
    id: 'github-fine-grained-pat',
    category: 'forge-token',
    regex: /\b(?<secret>github_pat_[0-9A-Za-z_]{22,})/d,
    skipLockFiles: false,
  },
  {
    id: 'gitlab-pat',
    category: 'forge-token',
    regex: /\b(?<secret>glpat-[0-9A-Za-z_-]{20,})/d,
    skipLockFiles: false,
  },
  {
    id: 'google-api-key',
    category: 'cloud-credential',
    regex: /\b(?<secret>AIza[0-9A-Za-z_-]{35})/d,
    skipLockFiles: false,
  },
  {
    id: 'openai-api-key',
    category: 'platform-token',
    regex: /\b(?<secret>sk-(?:proj-)?[A-Za-z0-9_-]{20,})/d,
    skipLockFiles: false,
    accept: looksGenerated,
  },
  {
    id: 'stripe-live-key',
    category: 'payment-key',
    regex: /\b(?<secret>(?:sk|rk)_live_[0-9A-Za-z]{24,})/d,
    skipLockFiles: false,
  },
  {
    id: 'slack-token',
    category: 'chat-token',
    regex: /\b(?<secret>xox[abprsouvn]-[0-9]{8,13}-[0-9A-Za-z-]{8,})/d,
    skipLockFiles: false,
  },
  {
    id: 'slack-webhook',
    category: 'webhook',
    regex: /(?<secret>https:\/\/hooks\.slack\.com\/services\/T[A-Za-z0-9_]+\/B[A-Za-z0-9_]+\/[A-Za-z0-9_]+)/d,
    skipLockFiles: false,
  },
  {
    id: 'docker-hub-pat',
    category: 'platform-token',
    regex: /\b(?<secret>dckr_pat_[A-Za-z0-9_-]{20,})/d,
    skipLockFiles: false,
  },
  {
    id: 'npm-token',
    category: 'platform-token',
    regex: /\b(?<secret>npm_[A-Za-z0-9]{36})\b/d,
    skipLockFiles: false,
  },
  {
    id: 'private-key-block',
    category: 'private-key',
    regex: /(?<secret>-----BEGIN[ A-Z0-9_-]{0,100}PRIVATE KEY(?: BLOCK)?-----)/d,
    skipLockFiles: false,
  },
  {
    id: 'jwt',
    category: 'bearer-token',
    regex: /\b(?<secret>eyJ[A-Za-z0-9_-]{10,}\.eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,})/d,
    skipLockFiles: true,
  },
  {
    id: 'bearer-token',
    category: 'bearer-token',
    regex: /\bbearer\s+(?<secret>[A-Za-z0-9._~+/-]{20,}=*)/di,
    skipLockFiles: true,
    accept: looksGenerated,
  },
  {
    id: 'database-url',
    category: 'database-url',
    regex:
      /\b(?:postgres(?:ql)?|mysql|mariadb|mongodb(?:\+srv)?|rediss?|amqps?|mssql):\/\/[^\s:@/"']+:(?<secret>[^\s@/"']+)@/di,
    skipLockFiles: true,
    accept: notPlaceholder,
  },
  {
    id: 'generic-assignment',
    category: 'generic-assignment',
    regex: new RegExp(
      `${CREDENTIAL_KEY}["']?\\s*(?::=|[:=])\\s*["']?(?<secret>[A-Za-z0-9_\\-+/=.~]{20,})`,
      'di',
    ),
    skipLockFiles: true,
    accept: looksGenerated,
  },
] satisfies SecretPattern[]);
