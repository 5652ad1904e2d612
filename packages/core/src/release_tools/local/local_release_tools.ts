/**
 * LocalReleaseTools - release chores run through external programs
 *
 * git archive, gzip and xz build the source tarballs; gpg signs and verifies
 * assets. Programs run through the injected `execCommand`; scratch files
 * live in a temporary directory removed after each operation.
 *
 * @module release_tools/local
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { IReleaseTools } from '../release_tools';
import type { ExecCommand, ExecOptions } from '../../git/types';
import type { IForge } from '../../forge/forge';
import type { ReleaseAsset } from '../../forge/types';
import {
  CHECKSUM_SUFFIX,
  SIGNATURE_CONTENT_TYPE,
  SIGNATURE_SUFFIX,
  TARBALL_FORMATS,
  parseChecksum,
  splitCommand,
  tarballName,
  unsignedAssets,
} from '../assets';
import { AssetVerificationError, ReleaseToolError } from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('[ReleaseTools] ');

export type LocalReleaseToolsDependencies = {
  execCommand: ExecCommand;
  forge: IForge;
  /** Repository root; every program runs there */
  repoRoot: string;
  /** Directory prefix inside the tarballs */
  projectName: string;
  /** PR validation command; validation is skipped when null */
  validateCommand: string | null;
  restyleCommand: string;
  editor: string;
  /** Creates the scratch directory; a fresh OS temporary directory by default */
  makeTempDir?: () => Promise<string>;
};

export class LocalReleaseTools implements IReleaseTools {
  private readonly deps: LocalReleaseToolsDependencies;

  constructor(deps: LocalReleaseToolsDependencies) {
    this.deps = deps;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async run(command: string, args: string[], options: ExecOptions = {}): Promise<void> {
    const result = await this.deps.execCommand(command, args, { cwd: this.deps.repoRoot, ...options });
    if (result.exitCode !== 0) {
      throw new ReleaseToolError(`${command} exited with code ${result.exitCode}`, result.stderr);
    }
  }

  private async withTempDir<T>(body: (dir: string) => Promise<T>): Promise<T> {
    const dir = this.deps.makeTempDir
      ? await this.deps.makeTempDir()
      : await fs.mkdtemp(path.join(os.tmpdir(), 'relkit-'));
    try {
      return await body(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WORKING TREE
  // ═══════════════════════════════════════════════════════════════════════

  async validate(options: { commit: boolean }): Promise<void> {
    if (!this.deps.validateCommand) {
      logger.info('No validation command configured');
      return;
    }
    const [command, args] = splitCommand(this.deps.validateCommand);
    await this.run(command, [...args, options.commit ? '--commit' : '--no-commit']);
  }

  async editFile(relativePath: string): Promise<void> {
    const [command, args] = splitCommand(this.deps.editor);
    await this.run(command, [...args, relativePath], { interactive: true });
  }

  async restyle(): Promise<void> {
    const [command, args] = splitCommand(this.deps.restyleCommand);
    await this.run(command, args);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RELEASE ASSETS
  // ═══════════════════════════════════════════════════════════════════════

  async createTarballs(tag: string): Promise<void> {
    await this.withTempDir(async (dir) => {
      const tarPath = path.join(dir, `${tag}.tar`);
      for (const format of TARBALL_FORMATS) {
        logger.info(`Creating ${format.program} tarball for ${tag}`);
        await this.run('git', [
          'archive',
          '--format=tar',
          `--prefix=${this.deps.projectName}-${tag}/`,
          tag,
          `--output=${tarPath}`,
        ]);
        await this.run(format.program, ['-f', tarPath]);

        const name = tarballName(tag, format.extension);
        const data = await fs.readFile(path.join(dir, name));
        logger.info(`Uploading ${name} to release ${tag}`);
        await this.deps.forge.uploadAsset(tag, name, format.contentType, data);
      }
    });
  }

  async pendingSignatures(tag: string): Promise<string[]> {
    return unsignedAssets(await this.deps.forge.releaseAssets(tag));
  }

  async signAssets(tag: string): Promise<void> {
    const assets = await this.deps.forge.releaseAssets(tag);
    const pending = unsignedAssets(assets);
    if (pending.length === 0) {
      return;
    }
    await this.withTempDir(async (dir) => {
      for (const name of pending) {
        const asset = assets.find((a) => a.name === name);
        if (!asset) continue;
        const file = path.join(dir, name);
        await fs.writeFile(file, await this.deps.forge.downloadAsset(asset.id));
        await this.run('gpg', ['--armor', '--detach-sign', '--output', `${file}${SIGNATURE_SUFFIX}`, file], {
          interactive: true,
        });
        const signature = await fs.readFile(`${file}${SIGNATURE_SUFFIX}`);
        await this.deps.forge.uploadAsset(tag, `${name}${SIGNATURE_SUFFIX}`, SIGNATURE_CONTENT_TYPE, signature);
        logger.info(`Signed ${name}`);
      }
    });
  }

  async verifyAssets(tag: string): Promise<void> {
    const assets = await this.deps.forge.releaseAssets(tag);
    const byName = new Map(assets.map((a) => [a.name, a]));
    const downloads = new Map<number, Buffer>();
    const download = async (asset: ReleaseAsset): Promise<Buffer> => {
      const cached = downloads.get(asset.id);
      if (cached) {
        return cached;
      }
      const data = await this.deps.forge.downloadAsset(asset.id);
      downloads.set(asset.id, data);
      return data;
    };

    const failures = unsignedAssets(assets).map((name) => `${name}: not signed`);

    await this.withTempDir(async (dir) => {
      for (const asset of assets) {
        if (asset.name.endsWith(SIGNATURE_SUFFIX)) {
          const target = byName.get(asset.name.slice(0, -SIGNATURE_SUFFIX.length));
          if (!target) {
            failures.push(`${asset.name}: signed file missing`);
            continue;
          }
          const file = path.join(dir, target.name);
          await fs.writeFile(file, await download(target));
          await fs.writeFile(`${file}${SIGNATURE_SUFFIX}`, await download(asset));
          const result = await this.deps.execCommand('gpg', ['--verify', `${file}${SIGNATURE_SUFFIX}`, file], {
            cwd: this.deps.repoRoot,
          });
          if (result.exitCode !== 0) {
            failures.push(`${target.name}: bad signature`);
          }
        } else if (asset.name.endsWith(CHECKSUM_SUFFIX)) {
          const target = byName.get(asset.name.slice(0, -CHECKSUM_SUFFIX.length));
          if (!target) {
            failures.push(`${asset.name}: checksummed file missing`);
            continue;
          }
          const expected = parseChecksum((await download(asset)).toString('utf8'));
          const actual = createHash('sha256').update(await download(target)).digest('hex');
          if (expected !== actual) {
            failures.push(`${target.name}: checksum mismatch`);
          }
        }
      }
    });

    if (failures.length > 0) {
      throw new AssetVerificationError(failures);
    }
    logger.info(`Verified ${assets.length} assets of ${tag}`);
  }
}
