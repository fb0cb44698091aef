import axios, { AxiosResponse } from "axios";
import {
  COMMIT_ENDPOINT,
  DEFAULT_GITHUB_API_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY,
  DEFAULT_TIMEOUT,
  GITHUB_API_VERSION,
  GITHUB_SHA_MEDIA_TYPE,
  USER_AGENT,
} from "./constants";
import { ResolverAPIError, ResolverError } from "./exceptions";
import { ActionReference, ClientOptions, HttpTransport } from "./models";

export interface GitHubClientOptions extends ClientOptions {
  token?: string;
  apiUrl?: string;
}

const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/i;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export function createTransport(timeout: number): HttpTransport {
  return axios.create({
    timeout,
    headers: { "User-Agent": USER_AGENT },
    // Status handling is done by the callers.
    validateStatus: () => true,
  });
}

/**
 * Retries `request` on transport failures (no HTTP response). Responses of any
 * status are returned to the caller as-is.
 */
export async function withRetry(
  request: () => Promise<AxiosResponse>,
  maxRetries: number,
  baseDelay: number,
): Promise<AxiosResponse> {
  let attempt = 0;
  while (true) {
    try {
      return await request();
    } catch (error: unknown) {
      attempt += 1;
      if (attempt >= maxRetries) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ResolverError(`Request failed after ${attempt} attempt(s): ${message}`);
      }
      await sleep(2 ** attempt * baseDelay);
    }
  }
}

export function describeBody(data: unknown): string {
  if (typeof data === "string") {
    return data.trim().slice(0, 200) || "empty response";
  }
  if (data && typeof data === "object" && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return "unexpected response";
}

export class GitHubClient {
  private readonly apiUrl: string;
  private readonly token?: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelay: number;
  private readonly http: HttpTransport;

  constructor(options: GitHubClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/$/, "");
    this.token = options.token || undefined;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelay = options.retryBaseDelay ?? DEFAULT_RETRY_BASE_DELAY;
    this.http = options.http ?? createTransport(options.timeout ?? DEFAULT_TIMEOUT);
  }

  async resolveCommit(reference: ActionReference): Promise<string> {
    const url = `${this.apiUrl}${COMMIT_ENDPOINT(reference.owner, reference.repo, reference.ref)}`;
    const headers: Record<string, string> = {
      Accept: GITHUB_SHA_MEDIA_TYPE,
      "X-GitHub-Api-Version": GITHUB_API_VERSION,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await withRetry(
      () => this.http.get(url, { headers, responseType: "text" }),
      this.maxRetries,
      this.retryBaseDelay,
    );

    if (response.status >= 400) {
      throw new ResolverAPIError(
        response.status,
        `${reference.owner}/${reference.repo}@${reference.ref}: ${describeBody(response.data)}`,
      );
    }

    const sha = typeof response.data === "string" ? response.data.trim() : "";
    if (!COMMIT_SHA_PATTERN.test(sha)) {
      throw new ResolverError(
        `GitHub returned an unexpected commit id for ${reference.owner}/${reference.repo}@${reference.ref}`,
      );
    }
    return sha.toLowerCase();
  }
}
