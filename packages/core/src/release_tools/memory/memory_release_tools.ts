/**
 * MemoryReleaseTools - IReleaseTools for tests
 *
 * Tarballs and signatures are uploaded to the given forge with placeholder
 * contents. Hooks let a test change the workspace when the formatter, the
 * validator or the editor "runs".
 *
 * @module release_tools/memory
 */

import type { IReleaseTools } from '../release_tools';
import type { IForge } from '../../forge/forge';
import {
  SIGNATURE_CONTENT_TYPE,
  SIGNATURE_SUFFIX,
  TARBALL_FORMATS,
  hasTarballs,
  tarballName,
  unsignedAssets,
} from '../assets';
import { AssetVerificationError } from '../errors';

export type MemoryReleaseToolsHooks = {
  onValidate?: (options: { commit: boolean }) => Promise<void>;
  onEdit?: (relativePath: string) => Promise<void>;
  onRestyle?: () => Promise<void>;
};

export class MemoryReleaseTools implements IReleaseTools {
  readonly calls: string[] = [];
  hooks: MemoryReleaseToolsHooks;
  /** Reported by verifyAssets; empty means every asset verifies */
  verificationFailures: string[] = [];
  private readonly forge: IForge;

  constructor(forge: IForge, hooks: MemoryReleaseToolsHooks = {}) {
    this.forge = forge;
    this.hooks = hooks;
  }

  async validate(options: { commit: boolean }): Promise<void> {
    this.calls.push(`validate${options.commit ? ' --commit' : ''}`);
    await this.hooks.onValidate?.(options);
  }

  async editFile(relativePath: string): Promise<void> {
    this.calls.push(`edit ${relativePath}`);
    await this.hooks.onEdit?.(relativePath);
  }

  async restyle(): Promise<void> {
    this.calls.push('restyle');
    await this.hooks.onRestyle?.();
  }

  async createTarballs(tag: string): Promise<void> {
    this.calls.push(`tarballs ${tag}`);
    if (hasTarballs(await this.forge.releaseAssets(tag), tag)) {
      return;
    }
    for (const format of TARBALL_FORMATS) {
      await this.forge.uploadAsset(
        tag,
        tarballName(tag, format.extension),
        format.contentType,
        Buffer.from(`${format.program}:${tag}`)
      );
    }
  }

  async pendingSignatures(tag: string): Promise<string[]> {
    return unsignedAssets(await this.forge.releaseAssets(tag));
  }

  async signAssets(tag: string): Promise<void> {
    this.calls.push(`sign ${tag}`);
    for (const name of await this.pendingSignatures(tag)) {
      await this.forge.uploadAsset(tag, `${name}${SIGNATURE_SUFFIX}`, SIGNATURE_CONTENT_TYPE, Buffer.from(`sig:${name}`));
    }
  }

  async verifyAssets(tag: string): Promise<void> {
    this.calls.push(`verify ${tag}`);
    if (this.verificationFailures.length > 0) {
      throw new AssetVerificationError(this.verificationFailures);
    }
  }
}
