import type { ImageReference } from '@medrun/shared';

const DEFAULT_TAG = 'latest';
const DOCKER_HUB_PREFIXES = ['docker.io/', 'index.docker.io/', 'registry-1.docker.io/'];

/**
 * Strip the implicit Docker Hub registry and "library/" namespace so that
 * "docker.io/library/ubuntu" and "ubuntu" compare equal
 */
export function normalizeRepository(repository: string): string {
  let repo = repository;
  for (const prefix of DOCKER_HUB_PREFIXES) {
    if (repo.startsWith(prefix)) {
      repo = repo.slice(prefix.length);
      break;
    }
  }
  if (repo.startsWith('library/')) {
    repo = repo.slice('library/'.length);
  }
  return repo;
}

/**
 * Parse "registry/repo:tag@sha256:..." into its parts; the tag defaults to "latest"
 */
export function parseImageReference(reference: string): ImageReference {
  let rest = reference.trim();
  let digest: string | undefined;

  const at = rest.indexOf('@');
  if (at >= 0) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  // A colon after the last slash is a tag; before it, a registry port
  let repository = rest;
  let tag = DEFAULT_TAG;
  const slash = rest.lastIndexOf('/');
  const colon = rest.lastIndexOf(':');
  if (colon > slash) {
    repository = rest.slice(0, colon);
    tag = rest.slice(colon + 1) || DEFAULT_TAG;
  }

  return {
    repository: normalizeRepository(repository),
    tag,
    ...(digest ? { digest } : {}),
  };
}

export function formatImageReference(image: Pick<ImageReference, 'repository' | 'tag'>): string {
  return `${image.repository}:${image.tag}`;
}

/**
 * Canonical "repository:tag" key used to match catalog entries against local images
 */
export function normalizeImageReference(reference: string): string {
  return formatImageReference(parseImageReference(reference));
}
