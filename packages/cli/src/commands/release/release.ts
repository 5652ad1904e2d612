import { Command } from 'commander';
import { ReleaseCommand } from './release-command';

/**
 * Register the release command
 */
export function registerReleaseCommand(program: Command): void {
  const releaseCommand = new ReleaseCommand();
  releaseCommand.register(program);
}
