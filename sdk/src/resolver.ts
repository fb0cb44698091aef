import { GitHubClient } from "./client";
import { DEFAULT_GITHUB_API_URL, DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT } from "./constants";
import { HttpTransport, ActionReference, PinResolver } from "./models";
import { RegistryClient } from "./registry";

export interface PinResolverOptions {
  githubToken?: string;
  githubApiUrl?: string;
  timeout?: number;
  maxRetries?: number;
  retryBaseDelay?: number;
  http?: HttpTransport;
}

/**
 * Resolves each distinct action ref or image at most once per instance.
 * Failed lookups are cached too, so one bad tag is reported once.
 */
export class CachingPinResolver implements PinResolver {
  private readonly actions = new Map<string, Promise<string>>();
  private readonly images = new Map<string, Promise<string>>();

  constructor(
    private readonly github: GitHubClient,
    private readonly registry: RegistryClient,
  ) {}

  resolveAction(reference: ActionReference): Promise<string> {
    const key = `${reference.owner}/${reference.repo}@${reference.ref}`.toLowerCase();
    let pending = this.actions.get(key);
    if (!pending) {
      pending = this.github.resolveCommit(reference);
      this.actions.set(key, pending);
    }
    return pending;
  }

  resolveImage(image: string): Promise<string> {
    let pending = this.images.get(image);
    if (!pending) {
      pending = this.registry.resolveDigest(image);
      this.images.set(image, pending);
    }
    return pending;
  }
}

export function createPinResolver(options: PinResolverOptions = {}): PinResolver {
  const shared = {
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryBaseDelay: options.retryBaseDelay,
    http: options.http,
  };
  const github = new GitHubClient({
    ...shared,
    token: options.githubToken,
    apiUrl: options.githubApiUrl ?? DEFAULT_GITHUB_API_URL,
  });
  return new CachingPinResolver(github, new RegistryClient(shared));
}
