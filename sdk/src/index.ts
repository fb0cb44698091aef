export { GitHubClient } from "./client";
export type { GitHubClientOptions } from "./client";
export { RegistryClient, parseImageReference, parseAuthChallenge } from "./registry";
export { CachingPinResolver, createPinResolver } from "./resolver";
export type { PinResolverOptions } from "./resolver";
export { ResolverError, ResolverAPIError, InvalidReferenceError } from "./exceptions";
export type {
  ActionReference,
  AuthChallenge,
  ClientOptions,
  HttpTransport,
  ImageReference,
  PinResolver,
} from "./models";
export * from "./constants";
