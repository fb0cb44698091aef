export const DEFAULT_GITHUB_API_URL = "https://api.github.com";
export const DEFAULT_TIMEOUT = 10000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY = 100;
export const USER_AGENT = "pushgate-sdk";

export const GITHUB_API_VERSION = "2022-11-28";
export const GITHUB_SHA_MEDIA_TYPE = "application/vnd.github.sha";
export const COMMIT_ENDPOINT = (owner: string, repo: string, ref: string) =>
  `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/commits/${encodeURIComponent(ref)}`;

export const DOCKER_HUB_REGISTRY = "docker.io";
export const DOCKER_HUB_API_HOST = "registry-1.docker.io";
export const MANIFEST_ENDPOINT = (repository: string, reference: string) => `/v2/${repository}/manifests/${reference}`;
export const MANIFEST_MEDIA_TYPES = [
  "application/vnd.oci.image.index.v1+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
  "application/vnd.docker.distribution.manifest.v2+json",
  "application/vnd.oci.image.manifest.v1+json",
];
