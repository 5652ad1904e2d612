import { Command } from 'commander';
import { SignTagCommand } from './sign-tag-command';

/**
 * Register the sign-tag command
 */
export function registerSignTagCommand(program: Command): void {
  const signTagCommand = new SignTagCommand();
  signTagCommand.register(program);
}
