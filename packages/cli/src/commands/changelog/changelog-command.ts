import { Command } from 'commander';
import { Changelog } from '@relkit/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ChangelogCommandOptions extends BaseCommandOptions {
  version: string;
  /** Replace the release notes of `version`; a `### Release notes` header is added when missing */
  notes?: string;
}

/**
 * Changelog Command - prints the release notes of a version as they appear
 * on the GitHub release, or sets them.
 */
export class ChangelogCommand extends BaseCommand<ChangelogCommandOptions> {
  protected commandName = 'changelog <version>';
  protected description = 'Print or set the release notes of a version';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('--notes <text>', 'Set the release notes instead of printing them')
      .option('--verbose', 'Print stack traces on failure')
      .option('--quiet', 'Suppress the success message')
      .action(async (version: string, options: Omit<ChangelogCommandOptions, 'version'>) => {
        await this.execute({ ...options, version });
      });
  }

  async execute(options: ChangelogCommandOptions): Promise<void> {
    await this.runAction(options, async () => {
      const changelog = await this.container.getChangelog();

      if (options.notes !== undefined) {
        const text = options.notes.trimStart().startsWith('### ')
          ? options.notes
          : `${Changelog.ISSUE_RELEASE_NOTES_HEADER}\n\n${options.notes}`;
        await changelog.setReleaseNotes(options.version, text);
        this.handleSuccess(options, `Release notes for ${options.version} written to ${changelog.file}`);
        return;
      }

      const notes = await changelog.getReleaseNotes(options.version);
      this.logger.log(Changelog.formatReleaseNotes(notes));
    });
  }
}
