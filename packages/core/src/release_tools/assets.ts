import type { ReleaseAsset } from '../forge/types';

export const SIGNATURE_SUFFIX = '.asc';
export const CHECKSUM_SUFFIX = '.sha256';
export const SIGNATURE_CONTENT_TYPE = 'application/pgp-signature';

export const TARBALL_FORMATS = [
  { extension: 'gz', program: 'gzip', contentType: 'application/gzip' },
  { extension: 'xz', program: 'xz', contentType: 'application/x-xz' },
] as const;

export function tarballName(tag: string, extension: string): string {
  return `${tag}.tar.${extension}`;
}

/** True when both source tarballs of `tag` are uploaded */
export function hasTarballs(assets: Array<Pick<ReleaseAsset, 'name'>>, tag: string): boolean {
  return TARBALL_FORMATS.every(({ extension }) => assets.some((a) => a.name === tarballName(tag, extension)));
}

/** Names of assets that are not signatures and have no `.asc` beside them */
export function unsignedAssets(assets: Array<Pick<ReleaseAsset, 'name'>>): string[] {
  const names = new Set(assets.map((a) => a.name));
  return assets
    .map((a) => a.name)
    .filter((name) => !name.endsWith(SIGNATURE_SUFFIX) && !names.has(`${name}${SIGNATURE_SUFFIX}`));
}

/**
 * First field of a `sha256sum` line. Returns null for anything that is not
 * a hex digest.
 */
export function parseChecksum(content: string): string | null {
  const [digest] = content.trim().split(/\s+/);
  return digest && /^[0-9a-f]{64}$/i.test(digest) ? digest.toLowerCase() : null;
}

/** Splits a configured command line on whitespace */
export function splitCommand(commandLine: string): [string, string[]] {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return [command, args];
}
