/**
 * Artifact and cache domain model.
 *
 * Artifact slots pass files between jobs of one run and are write-once.
 * Cache entries carry reusable build state across runs and are advisory.
 */

export interface ArtifactFile {
  /** Workspace-relative path, e.g. "target/release/marked-space". */
  path: string;
  content: Uint8Array;
  sizeBytes: number;
  sha256: string;
}

/** Identity of a slot within a run. */
export interface ArtifactSlotKey {
  name: string;
  matrixValue?: string;
  /** Sub-pipeline call site that wrote the slot. */
  callSite?: string;
}

export interface ArtifactSlot {
  runId: string;
  key: ArtifactSlotKey;
  /** Canonical string form of `key`. */
  slotId: string;
  /** Instance key of the writer. */
  producedBy: string;
  files: ArtifactFile[];
  createdAt: string;
  expiresAt: string;
}

export interface CacheEntry {
  key: string;
  files: ArtifactFile[];
  sizeBytes: number;
  createdAt: string;
}

/** "callSite/name@matrixValue", omitting absent parts. */
export function formatSlotId(key: ArtifactSlotKey): string {
  const scope = key.callSite ? `${key.callSite}/` : '';
  const matrix = key.matrixValue ? `@${key.matrixValue}` : '';
  return `${scope}${key.name}${matrix}`;
}

/** Last path segment, accepting both separators. */
export function fileBaseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}
