/**
 * Model catalog types
 */

export interface ImageReference {
  repository: string;            // e.g. "mhubai/totalsegmentator"
  tag: string;                   // defaults to "latest"
  digest?: string;               // sha256 digest declared by the catalog, if any
}

export interface ModelInputSpec {
  description: string;
  format: string;                // e.g. "DICOM", "NIFTI"
}

export interface ModelDescriptor {
  id: string;
  name: string;                  // Machine name, used for the default image reference
  label: string;                 // Display name
  description: string;
  modalities: string[];          // e.g. ["CT", "MR"]
  categories: string[];          // e.g. ["Segmentation"]
  regions: string[];             // Segmented structures / region of interest
  inputs: ModelInputSpec[];
  inputsCompatible: boolean;     // Single DICOM input producing a segmentation or prediction
  image: ImageReference;
  documentationUrl: string;
  cite?: string;
}

export interface ModelCatalogSnapshot {
  models: ModelDescriptor[];
  fetchedAt: string;
  source: string;
  warnings: string[];            // One entry per dropped catalog item
}

export type ImagePresence = 'NotPresent' | 'PresentUpToDate' | 'PresentStale';
export type ModelActivity = 'Idle' | 'Pulling' | 'Running';

export interface ModelImageStatus {
  modelId: string;
  image: string;                 // Normalized "repository:tag"
  status: ImagePresence;
  localDigest?: string;
  remoteDigest?: string;
}

export interface ModelStatus extends ModelImageStatus {
  activity: ModelActivity;
}

export interface ModelListResponse {
  models: ModelDescriptor[];
  fetchedAt: string | null;
}

export interface PullResult {
  modelId: string;
  image: string;
  status: ModelStatus;
}

export interface CatalogRefreshResponse {
  message: string;
  fetchedAt: string;
  count: number;
  warnings: string[];
}

export interface RemoveImageResponse {
  message: string;
  status: ModelStatus;
}
