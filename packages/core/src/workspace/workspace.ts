/**
 * Access to files of the repository checkout.
 *
 * Paths are relative to the repository root. The release flow only touches
 * a handful of text files (changelog, .gitignore, files of a commit to be
 * re-created through the API).
 */
export interface IWorkspace {
  /** Absolute path of the repository root */
  readonly root: string;
  /** File content, or null when the file does not exist */
  readFile(relativePath: string): Promise<string | null>;
  writeFile(relativePath: string, content: string): Promise<void>;
}
