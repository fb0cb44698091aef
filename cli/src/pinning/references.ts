export type ReferenceKind = 'action' | 'containerImage' | 'serviceImage';

export type PinStatus = 'pinned' | 'floatingTag' | 'localPath' | 'malformed';

/**
 * Where the value sits on its line. `valueStart`/`valueEnd` bound the value
 * without quotes; `comment` is a trailing `# ...` after it.
 */
export interface LineLayout {
  valueStart: number;
  valueEnd: number;
  quote: '' | '"' | "'";
  comment?: string;
}

export interface WorkflowReference {
  file: string;
  lineNumber: number;
  kind: ReferenceKind;
  rawValue: string;
  pinStatus: PinStatus;
  reason?: string;
  layout: LineLayout;
}

export interface Classification {
  status: PinStatus;
  reason?: string;
}

const COMMIT_SHA = /^[0-9a-fA-F]{40}$/;
const PINNED_DIGEST = /@sha256:[0-9a-f]{64}$/;
const DOCKER_SCHEME = 'docker://';

function isExpression(value: string): boolean {
  return value.includes('${{');
}

export function classifyImage(value: string): Classification {
  if (!value) {
    return { status: 'malformed', reason: 'empty image reference' };
  }
  if (isExpression(value)) {
    return { status: 'malformed', reason: 'image is an expression and cannot be verified' };
  }
  if (PINNED_DIGEST.test(value)) {
    return { status: 'pinned' };
  }
  if (value.includes('@')) {
    return { status: 'malformed', reason: 'digest is not a valid @sha256:<64 hex>' };
  }
  return { status: 'floatingTag', reason: 'image is not pinned to a @sha256 digest' };
}

export function classifyAction(value: string): Classification {
  if (!value) {
    return { status: 'malformed', reason: 'empty uses value' };
  }
  if (isExpression(value)) {
    return { status: 'malformed', reason: 'uses is an expression and cannot be verified' };
  }
  if (value.startsWith('./') || value.startsWith('.github/')) {
    return { status: 'localPath' };
  }
  if (value.startsWith(DOCKER_SCHEME)) {
    return classifyImage(value.slice(DOCKER_SCHEME.length));
  }

  const at = value.lastIndexOf('@');
  if (at < 0) {
    return { status: 'malformed', reason: 'missing @<ref>' };
  }
  const name = value.slice(0, at);
  const ref = value.slice(at + 1);
  if (!name.includes('/') || !ref) {
    return { status: 'malformed', reason: 'expected owner/repo[/path]@<ref>' };
  }
  if (COMMIT_SHA.test(ref)) {
    return { status: 'pinned' };
  }
  return { status: 'floatingTag', reason: `ref "${ref}" is not a 40-character commit SHA` };
}

export function classify(kind: ReferenceKind, value: string): Classification {
  switch (kind) {
    case 'action':
      return classifyAction(value);
    case 'containerImage':
    case 'serviceImage':
      return classifyImage(value);
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown reference kind: ${String(unreachable)}`);
    }
  }
}

export function isViolation(reference: WorkflowReference): boolean {
  switch (reference.pinStatus) {
    case 'pinned':
    case 'localPath':
      return false;
    case 'floatingTag':
    case 'malformed':
      return true;
    default: {
      const unreachable: never = reference.pinStatus;
      throw new Error(`Unknown pin status: ${String(unreachable)}`);
    }
  }
}

/** `owner/repo[/path]@ref` split into the parts the resolver needs. */
export function splitActionValue(value: string): { owner: string; repo: string; path: string; ref: string } | null {
  const at = value.lastIndexOf('@');
  if (at < 0) return null;
  const [owner, repo, ...rest] = value.slice(0, at).split('/');
  const ref = value.slice(at + 1);
  if (!owner || !repo || !ref) return null;
  return { owner, repo, path: rest.join('/'), ref };
}

export function describeKind(kind: ReferenceKind): string {
  switch (kind) {
    case 'action':
      return 'action';
    case 'containerImage':
      return 'container image';
    case 'serviceImage':
      return 'service image';
    default: {
      const unreachable: never = kind;
      return String(unreachable);
    }
  }
}
