import type { AxiosRequestConfig, AxiosResponse } from "axios";

/**
 * The subset of an axios instance the clients use. Tests pass a stub.
 */
export interface HttpTransport {
  get(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse>;
  head(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse>;
}

export interface ClientOptions {
  timeout?: number;
  maxRetries?: number;
  retryBaseDelay?: number;
  http?: HttpTransport;
}

export interface ActionReference {
  owner: string;
  repo: string;
  /** Floating tag or branch, e.g. `v4` or `main`. */
  ref: string;
}

export interface ImageReference {
  original: string;
  registry: string;
  apiHost: string;
  repository: string;
  tag: string;
}

export interface AuthChallenge {
  scheme: string;
  realm?: string;
  service?: string;
  scope?: string;
}

export interface PinResolver {
  /** Returns the 40-character commit SHA the ref currently points at. */
  resolveAction(reference: ActionReference): Promise<string>;
  /** Returns the manifest digest (`sha256:<64 hex>`) the image tag currently points at. */
  resolveImage(image: string): Promise<string>;
}
