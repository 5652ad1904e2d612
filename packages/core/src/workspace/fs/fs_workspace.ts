import { promises as fs } from 'fs';
import * as path from 'path';
import type { IWorkspace } from '../workspace';

/**
 * Workspace backed by the local filesystem.
 */
export class FsWorkspace implements IWorkspace {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async readFile(relativePath: string): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.root, relativePath), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeFile(relativePath: string, content: string): Promise<void> {
    await fs.writeFile(path.join(this.root, relativePath), content, 'utf-8');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
