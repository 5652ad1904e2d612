import { Command } from 'commander';
import { Release } from '@relkit/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface SignTagCommandOptions extends BaseCommandOptions {
  /** Defaults to the most recent release tag */
  tag?: string;
  upstream?: string;
  verifyOnly?: boolean;
  localOnly?: boolean;
}

/**
 * Sign-tag Command - replaces the unsigned tag CI pushed with a signed one.
 */
export class SignTagCommand extends BaseCommand<SignTagCommandOptions> {
  protected commandName = 'sign-tag';
  protected description = 'Sign a release tag created by CI and push it';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('--tag <tag>', 'Tag to sign (default: most recent release tag)')
      .option('--upstream <remote>', 'Remote to fetch from and push to', 'upstream')
      .option('--verify-only', 'Only check the signature of an already signed tag', false)
      .option('--local-only', 'Sign without pushing', false)
      .option('--verbose', 'Print stack traces on failure')
      .option('--quiet', 'Suppress the success message')
      .action(async (options: SignTagCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: SignTagCommandOptions): Promise<void> {
    await this.runAction(options, async () => {
      const upstream = options.upstream || 'upstream';
      const result = await Release.signReleaseTag(this.container.getVersionControl(), {
        ...(options.tag ? { tag: options.tag } : {}),
        upstream,
        verifyOnly: options.verifyOnly ?? false,
        localOnly: options.localOnly ?? false,
      });

      switch (result.status) {
        case 'already-signed':
          this.handleSuccess(options, `Tag ${result.tag} is already signed`);
          break;
        case 'signed':
          this.handleSuccess(options, `Signed ${result.tag} (not pushed)`);
          break;
        case 'pushed':
          this.handleSuccess(options, `Signed ${result.tag} and pushed it to ${upstream}`);
          break;
      }
    });
  }
}
