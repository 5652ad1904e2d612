/**
 * IReleaseTools - release chores that run outside git and the forge API
 *
 * PR validation, the formatter, the changelog editor, source tarballs and
 * detached asset signatures. Every operation is safe to repeat.
 */
export interface IReleaseTools {
  /** Runs the PR validation command; with `commit` it stages its fixes */
  validate(options: { commit: boolean }): Promise<void>;
  /** Opens the configured editor on a workspace file and waits for it */
  editFile(relativePath: string): Promise<void>;
  /** Runs the formatter over the working tree */
  restyle(): Promise<void>;
  /** Builds `<tag>.tar.gz` and `<tag>.tar.xz` and uploads them to the release */
  createTarballs(tag: string): Promise<void>;
  /** Names of release assets without a detached signature */
  pendingSignatures(tag: string): Promise<string[]>;
  /** Signs and uploads every pending asset */
  signAssets(tag: string): Promise<void>;
  /** Throws AssetVerificationError unless every signature and checksum holds */
  verifyAssets(tag: string): Promise<void>;
}
