import { AxiosResponse } from "axios";
import { createTransport, describeBody, withRetry } from "./client";
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY,
  DEFAULT_TIMEOUT,
  DOCKER_HUB_API_HOST,
  DOCKER_HUB_REGISTRY,
  MANIFEST_ENDPOINT,
  MANIFEST_MEDIA_TYPES,
} from "./constants";
import { InvalidReferenceError, ResolverAPIError, ResolverError } from "./exceptions";
import { AuthChallenge, ClientOptions, HttpTransport, ImageReference } from "./models";

const DIGEST_PATTERN = /^sha256:[0-9a-f]{64}$/;
const DOCKER_HUB_ALIASES = new Set(["docker.io", "index.docker.io", "registry-1.docker.io"]);

/**
 * Splits `[registry/]name[:tag][@digest]` into its parts. Docker Hub is the
 * default registry and single-segment names live under `library/`.
 */
export function parseImageReference(image: string): ImageReference {
  const original = image.trim();
  if (!original || /\s/.test(original)) {
    throw new InvalidReferenceError(image, "empty or contains whitespace");
  }

  const withoutDigest = original.split("@")[0];
  const segments = withoutDigest.split("/");
  let registry = DOCKER_HUB_REGISTRY;
  const first = segments[0];
  if (segments.length > 1 && (first.includes(".") || first.includes(":") || first === "localhost")) {
    registry = segments.shift() ?? DOCKER_HUB_REGISTRY;
  }

  const last = segments.pop() ?? "";
  const colon = last.lastIndexOf(":");
  const name = colon >= 0 ? last.slice(0, colon) : last;
  const tag = colon >= 0 ? last.slice(colon + 1) : "latest";
  if (!name || !tag) {
    throw new InvalidReferenceError(image, "missing repository name or tag");
  }
  segments.push(name);

  const isDockerHub = DOCKER_HUB_ALIASES.has(registry);
  if (isDockerHub && segments.length === 1) {
    segments.unshift("library");
  }

  return {
    original,
    registry: isDockerHub ? DOCKER_HUB_REGISTRY : registry,
    apiHost: isDockerHub ? DOCKER_HUB_API_HOST : registry,
    repository: segments.join("/").toLowerCase(),
    tag,
  };
}

/**
 * Parses a `WWW-Authenticate` header such as
 * `Bearer realm="https://auth.docker.io/token",service="registry.docker.io"`.
 */
export function parseAuthChallenge(header: string): AuthChallenge | null {
  const match = /^\s*(\w+)\s*(.*)$/.exec(header);
  if (!match) {
    return null;
  }

  const challenge: AuthChallenge = { scheme: match[1] };
  const paramPattern = /(\w+)="([^"]*)"/g;
  let param: RegExpExecArray | null;
  while ((param = paramPattern.exec(match[2])) !== null) {
    const [, key, value] = param;
    if (key === "realm" || key === "service" || key === "scope") {
      challenge[key] = value;
    }
  }
  return challenge;
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers?.[name];
  return typeof value === "string" ? value : undefined;
}

export class RegistryClient {
  private readonly maxRetries: number;
  private readonly retryBaseDelay: number;
  private readonly http: HttpTransport;

  constructor(options: ClientOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelay = options.retryBaseDelay ?? DEFAULT_RETRY_BASE_DELAY;
    this.http = options.http ?? createTransport(options.timeout ?? DEFAULT_TIMEOUT);
  }

  async resolveDigest(image: string): Promise<string> {
    const reference = parseImageReference(image);
    const url = `https://${reference.apiHost}${MANIFEST_ENDPOINT(reference.repository, reference.tag)}`;
    const headers: Record<string, string> = { Accept: MANIFEST_MEDIA_TYPES.join(", ") };

    let response = await this.head(url, headers);
    if (response.status === 401) {
      const challenge = parseAuthChallenge(headerValue(response, "www-authenticate") ?? "");
      if (!challenge || challenge.scheme.toLowerCase() !== "bearer" || !challenge.realm) {
        throw new ResolverAPIError(401, `${reference.original}: registry requires unsupported authentication`);
      }
      const token = await this.fetchToken(challenge, reference);
      response = await this.head(url, { ...headers, Authorization: `Bearer ${token}` });
    }

    if (response.status >= 400) {
      throw new ResolverAPIError(response.status, `${reference.original}: ${describeBody(response.data)}`);
    }

    const digest = headerValue(response, "docker-content-digest");
    if (!digest || !DIGEST_PATTERN.test(digest)) {
      throw new ResolverError(`${reference.original}: registry did not return a sha256 manifest digest`);
    }
    return digest;
  }

  private head(url: string, headers: Record<string, string>): Promise<AxiosResponse> {
    return withRetry(() => this.http.head(url, { headers }), this.maxRetries, this.retryBaseDelay);
  }

  private async fetchToken(challenge: AuthChallenge, reference: ImageReference): Promise<string> {
    const params: Record<string, string> = {
      scope: challenge.scope ?? `repository:${reference.repository}:pull`,
    };
    if (challenge.service) {
      params.service = challenge.service;
    }

    const realm = challenge.realm ?? "";
    const response = await withRetry(
      () => this.http.get(realm, { params }),
      this.maxRetries,
      this.retryBaseDelay,
    );
    if (response.status >= 400) {
      throw new ResolverAPIError(response.status, `token request to ${realm} failed`);
    }

    const data: unknown = response.data;
    if (data && typeof data === "object") {
      if ("token" in data && typeof data.token === "string") {
        return data.token;
      }
      if ("access_token" in data && typeof data.access_token === "string") {
        return data.access_token;
      }
    }
    throw new ResolverError(`token response from ${realm} did not contain a token`);
  }
}
