/**
 * Version derivation from the project manifest.
 *
 * The manifest is read as plain text: the first line starting with
 * `version` is the version line. Tag names are always derived from it,
 * never taken from a pushed ref.
 */

import { VersionTag } from '../domain/release';
import { VersionError, createTypedError } from '../domain/errors';

export const MANIFEST_PATH = 'Cargo.toml';

const VERSION_LINE = /^version\s*=\s*"([^"]*)"\s*$/;
const STRICT_SEMVER = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

function invalidVersion(message: string, details: Record<string, unknown>): VersionError {
  return new VersionError(createTypedError({
    code: 'VERSION.INVALID',
    message,
    details,
    suggestedFixes: [
      { type: 'FIX_MANIFEST', params: { path: MANIFEST_PATH }, description: 'Set version = "MAJOR.MINOR.PATCH" in the manifest' },
    ],
  }));
}

/** Extract the raw version string from manifest text. */
export function parseManifestVersion(manifest: string): string {
  const line = manifest
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.startsWith('version'));
  if (line === undefined) {
    throw invalidVersion('Manifest has no version line', {});
  }
  const match = VERSION_LINE.exec(line);
  if (!match || match[1] === undefined) {
    throw invalidVersion(`Malformed version line: ${line}`, { line });
  }
  return match[1];
}

/** Parse a strict MAJOR.MINOR.PATCH string into a VersionTag. */
export function parseVersion(version: string): VersionTag {
  const match = STRICT_SEMVER.exec(version);
  if (!match) {
    throw invalidVersion(`Version "${version}" is not strict MAJOR.MINOR.PATCH`, { version });
  }
  const major = Number(match[1]);
  const minor = Number(match[2]);
  const patch = Number(match[3]);
  return {
    major,
    minor,
    patch,
    version,
    tags: [`v${major}.${minor}.${patch}`, `v${major}.${minor}`, `v${major}`],
  };
}

/** Manifest text → version tags. */
export function deriveVersionTag(manifest: string): VersionTag {
  return parseVersion(parseManifestVersion(manifest));
}

/** "refs/tags/v1.4.0" → "v1.4.0"; anything else → undefined. */
export function tagNameFromRef(ref: string): string | undefined {
  const prefix = 'refs/tags/';
  return ref.startsWith(prefix) ? ref.slice(prefix.length) : undefined;
}
