/**
 * Container engine types
 */

export type EngineName = 'docker' | 'udocker';

export interface LocalImage {
  reference: string;             // "repository:tag"
  repository: string;
  tag: string;
  digest?: string;               // Registry digest, when the engine reports one
  imageId?: string;
  size?: string;
  pulledAt?: string;
}

export interface GpuDevice {
  id: string;                    // Value passed to the engine's device selection
  index: number;
  name: string;
  memoryMiB: number | null;
  uuid?: string;
  available: boolean;
}

export interface EngineInfo {
  name: EngineName;
  executable: string;
  version: string;
  available: boolean;
  error?: string;
}

export interface PullProgressEvent {
  reference: string;
  line: string;
  layer?: string;
  status?: string;
}
