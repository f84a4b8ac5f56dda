/**
 * Release domain model.
 */

/** Version triple derived from the project manifest. */
export interface VersionTag {
  major: number;
  minor: number;
  patch: number;
  /** "MAJOR.MINOR.PATCH" */
  version: string;
  /** [vMAJOR.MINOR.PATCH, vMAJOR.MINOR, vMAJOR] */
  tags: [string, string, string];
}

export interface ReleaseAsset {
  /** File name as published, e.g. "marked-space.exe". */
  name: string;
  sizeBytes: number;
  sha256: string;
  /** Slot the file was taken from. */
  sourceSlot: string;
}

/** A tagged release. Replaced wholesale when composed again under the same id. */
export interface ReleaseRecord {
  /** Tag name, or the rolling identifier ("latest") for development builds. */
  id: string;
  title: string;
  draft: boolean;
  prerelease: boolean;
  commit: string;
  assets: ReleaseAsset[];
  runId: string;
  createdAt: string;
  updatedAt: string;
}
