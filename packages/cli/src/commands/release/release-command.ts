import { Command } from 'commander';
import { Config } from '@relkit/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Release Command Options
 * Maps CLI flags to ReleaseConfig fields
 */
export interface ReleaseCommandOptions extends BaseCommandOptions {
  branch?: string;
  mainBranch?: string;
  dryrun?: boolean;
  force?: boolean;
  /** Defaults to GITHUB_ACTIONS=true in the environment */
  githubActions?: boolean;
  /** Tracking issue number, as typed */
  issue?: string;
  production?: boolean;
  rebase?: boolean;
  resume?: boolean;
  verify?: boolean;
  version?: string;
  upstream?: string;
}

/**
 * Builds the run configuration from parsed flags. Throws on an issue
 * number that is not a positive integer.
 */
export function toReleaseConfig(options: ReleaseCommandOptions, ci: boolean): Config.ReleaseConfig {
  const overrides: Partial<Config.ReleaseConfig> = {
    githubActions: options.githubActions ?? ci,
  };
  if (options.branch !== undefined) overrides.branch = options.branch;
  if (options.mainBranch !== undefined) overrides.mainBranch = options.mainBranch;
  if (options.dryrun !== undefined) overrides.dryrun = options.dryrun;
  if (options.force !== undefined) overrides.force = options.force;
  if (options.production !== undefined) overrides.production = options.production;
  if (options.rebase !== undefined) overrides.rebase = options.rebase;
  if (options.resume !== undefined) overrides.resume = options.resume;
  if (options.verify !== undefined) overrides.verify = options.verify;
  if (options.version !== undefined) overrides.version = options.version;
  if (options.upstream !== undefined) overrides.upstream = options.upstream;

  if (options.issue !== undefined) {
    const issue = Number(options.issue);
    if (!Number.isInteger(issue) || issue <= 0) {
      throw new Error(`Invalid issue number: ${options.issue}`);
    }
    overrides.issue = issue;
  }
  return Config.createReleaseConfig(overrides);
}

/**
 * Release Command - runs the release state machine once.
 *
 * A run that stops at a human gate exits with code 0 after printing what
 * the human has to do; running the command again picks up from there.
 */
export class ReleaseCommand extends BaseCommand<ReleaseCommandOptions> {
  protected commandName = 'release';
  protected description = 'Drive a release from tracking issue to published release';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('--branch <name>', 'Branch to cut the release from')
      .option('--main-branch <name>', 'Branch the release PR targets')
      .option('--dryrun', 'Stop before creating the pull request')
      .option('--no-dryrun', 'Disable dry run')
      .option('--force', 'Force-push the release branch')
      .option('--no-force', 'Never force-push')
      .option('--github-actions', 'Run as the CI bot (default: $GITHUB_ACTIONS)')
      .option('--issue <number>', 'Release tracking issue')
      .option('--production', 'Production release instead of a release candidate')
      .option('--no-production', 'Release candidate')
      .option('--rebase', 'Rebase an existing release branch')
      .option('--no-rebase', 'Leave an existing release branch alone')
      .option('--resume', 'Keep release notes already in the changelog')
      .option('--verify', 'Only check that the release PR passes its checks')
      .option('--version <version>', 'Release this version instead of the next one ("latest" for the latest release)')
      .option('--upstream <remote>', 'Remote of the main repository')
      .option('--verbose', 'Print stack traces on failure')
      .option('--quiet', 'Suppress the success message')
      .action(async (options: ReleaseCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: ReleaseCommandOptions): Promise<void> {
    await this.runAction(options, async () => {
      const config = toReleaseConfig(options, this.container.getEnvironment().ci);
      const orchestrator = await this.container.getReleaseOrchestrator(config);
      const result = await orchestrator.run();

      switch (result.status) {
        case 'completed':
          this.handleSuccess(options, `Release ${result.version} completed`);
          break;
        case 'verified':
          this.handleSuccess(options, `Release PR for ${result.version} passes its checks`);
          break;
        case 'dry-run':
          this.handleSuccess(options, `Dry run for ${result.version} finished`);
          break;
      }
    });
  }
}
