export type { IReleaseTools } from './release_tools';
export { LocalReleaseTools } from './local/local_release_tools';
export type { LocalReleaseToolsDependencies } from './local/local_release_tools';
export { MemoryReleaseTools } from './memory/memory_release_tools';
export type { MemoryReleaseToolsHooks } from './memory/memory_release_tools';
export { ReleaseToolError, AssetVerificationError } from './errors';
export {
  CHECKSUM_SUFFIX,
  SIGNATURE_CONTENT_TYPE,
  SIGNATURE_SUFFIX,
  TARBALL_FORMATS,
  hasTarballs,
  parseChecksum,
  splitCommand,
  tarballName,
  unsignedAssets,
} from './assets';
