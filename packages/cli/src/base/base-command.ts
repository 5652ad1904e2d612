/**
 * Base Command Class for the relkit CLI
 *
 * Provides common output and exit-code handling for every command and the
 * shared dependency service.
 */

import { Command } from 'commander';
import { Stage } from '@relkit/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();
  protected readonly logger = console;

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Runs `action` and maps its outcome to an exit code. A UserAbort is a
   * pause, not a failure: the instruction is printed and the exit code is 0.
   */
  protected async runAction(options: TOptions, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      if (Stage.isUserAbort(error)) {
        this.logger.log(`⏸️  ${error.instruction}`);
        process.exit(0);
        return;
      }
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
    console.error(formattedMessage);
    if (options.verbose && error?.stack) {
      console.error(`🔍 Technical details: ${error.stack}`);
    }
    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(options: TOptions, message: string): void {
    if (!options.quiet) {
      console.log(`✅ ${message}`);
    }
  }
}
