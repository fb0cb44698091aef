import { type PinResolver, createPinResolver } from '@pushgate/sdk';
import type { ResolverConfig } from '../utils/config';

export function resolverFromConfig(config: ResolverConfig): PinResolver {
  return createPinResolver({
    githubToken: config.github_token,
    githubApiUrl: config.github_api_url,
    timeout: config.timeout,
    maxRetries: config.retry_count,
  });
}
