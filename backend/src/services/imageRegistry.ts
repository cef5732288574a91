import type {
  ImagePresence,
  LocalImage,
  ModelCatalogSnapshot,
  ModelDescriptor,
  ModelImageStatus,
} from '@medrun/shared';
import { formatImageReference, normalizeImageReference } from '../lib/imageReference';

/**
 * Index local images by their normalized "repository:tag" reference
 */
export function indexLocalImages(localImages: LocalImage[]): Map<string, LocalImage> {
  const index = new Map<string, LocalImage>();
  for (const image of localImages) {
    const key = normalizeImageReference(image.reference);
    // docker lists one row per digest; keep the first
    if (!index.has(key)) {
      index.set(key, image);
    }
  }
  return index;
}

/** Strip a "repo@" prefix so bare and qualified digests compare equal */
function bareDigest(digest: string): string {
  const at = digest.lastIndexOf('@');
  return at >= 0 ? digest.slice(at + 1) : digest;
}

/**
 * Presence of one descriptor's image among the local images. Stale only when
 * the catalog declares a digest and the local one differs.
 */
export function resolveImageStatus(
  descriptor: ModelDescriptor,
  localImages: LocalImage[] | Map<string, LocalImage>
): ModelImageStatus {
  const index = localImages instanceof Map ? localImages : indexLocalImages(localImages);
  const reference = formatImageReference(descriptor.image);
  const local = index.get(normalizeImageReference(reference));
  const remoteDigest = descriptor.image.digest;

  let status: ImagePresence;
  if (!local) {
    status = 'NotPresent';
  } else if (remoteDigest && (!local.digest || bareDigest(local.digest) !== bareDigest(remoteDigest))) {
    status = 'PresentStale';
  } else {
    status = 'PresentUpToDate';
  }

  return {
    modelId: descriptor.id,
    image: reference,
    status,
    ...(local?.digest ? { localDigest: local.digest } : {}),
    ...(remoteDigest ? { remoteDigest } : {}),
  };
}

/**
 * Status of every catalog entry, in catalog order
 */
export function computeModelStatuses(
  snapshot: Pick<ModelCatalogSnapshot, 'models'>,
  localImages: LocalImage[]
): ModelImageStatus[] {
  const index = indexLocalImages(localImages);
  return snapshot.models.map((descriptor) => resolveImageStatus(descriptor, index));
}
