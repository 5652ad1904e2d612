import type { IWorkspace } from '../workspace';

export type MemoryWorkspaceOptions = {
  /** Called after a write that changed a file's content */
  onChange?: (relativePath: string) => void;
};

/**
 * In-memory workspace for tests.
 */
export class MemoryWorkspace implements IWorkspace {
  readonly root: string;
  private files: Map<string, string>;
  private readonly onChange: ((relativePath: string) => void) | undefined;

  constructor(root: string = '/repo', files: Record<string, string> = {}, options: MemoryWorkspaceOptions = {}) {
    this.root = root;
    this.files = new Map(Object.entries(files));
    this.onChange = options.onChange;
  }

  setFile(relativePath: string, content: string): void {
    this.files.set(relativePath, content);
  }

  getFile(relativePath: string): string | undefined {
    return this.files.get(relativePath);
  }

  async readFile(relativePath: string): Promise<string | null> {
    return this.files.get(relativePath) ?? null;
  }

  async writeFile(relativePath: string, content: string): Promise<void> {
    const previous = this.files.get(relativePath);
    this.files.set(relativePath, content);
    if (previous !== content) {
      this.onChange?.(relativePath);
    }
  }
}
