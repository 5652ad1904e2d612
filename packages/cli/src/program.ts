import { Command } from 'commander';
import { registerReleaseCommand } from './commands/release/release';
import { registerSignTagCommand } from './commands/sign-tag/sign-tag';
import { registerChangelogCommand } from './commands/changelog/changelog';

/**
 * Builds the relkit program. Program options only count before the command
 * name, so `relkit release --version v1.2.3` reaches the release command.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('relkit')
    .description('Resumable release orchestration for GitHub-hosted projects')
    .version('0.1.0')
    .enablePositionalOptions();

  registerReleaseCommand(program);
  registerSignTagCommand(program);
  registerChangelogCommand(program);

  return program;
}
