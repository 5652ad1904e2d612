import { Command } from 'commander';
import { ChangelogCommand } from './changelog-command';

/**
 * Register the changelog command
 */
export function registerChangelogCommand(program: Command): void {
  const changelogCommand = new ChangelogCommand();
  changelogCommand.register(program);
}
