import * as path from 'path';
import { Octokit } from '@octokit/rest';
import { spawn } from 'child_process';
import { Changelog, Config, Forge, Git, Release, ReleaseTools, Workspace } from '@relkit/core';

/**
 * Runs a program and collects its output. Interactive programs (editors,
 * gpg pinentry) share the terminal, so their output is not captured.
 */
export const spawnCommand: Git.ExecCommand = (command, args, options) => {
  return new Promise<Git.ExecResult>((resolve) => {
    const proc = spawn(command, args, {
      cwd: options?.cwd || process.cwd(),
      env: { ...process.env, ...options?.env },
      stdio: options?.interactive ? 'inherit' : 'pipe',
      ...(options?.timeout !== undefined && { timeout: options.timeout }),
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
    proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

    proc.on('close', (code: number | null) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    proc.on('error', (error: Error) => {
      resolve({ exitCode: 1, stdout, stderr: error.message });
    });
  });
};

/**
 * Dependency Injection Service for the relkit CLI
 *
 * Creates the local git, filesystem, GitHub and release-tool collaborators
 * from the process environment, once per process.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private environment: Config.ReleaseEnvironment | null = null;
  private versionControl: Git.LocalVersionControl | null = null;
  private workspace: Workspace.FsWorkspace | null = null;
  private settings: Config.ReleaseSettings | null = null;
  private forge: Forge.GitHubForge | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getEnvironment(): Config.ReleaseEnvironment {
    if (!this.environment) {
      this.environment = Config.readEnvironment(process.env);
    }
    return this.environment;
  }

  getVersionControl(): Git.LocalVersionControl {
    if (!this.versionControl) {
      this.versionControl = new Git.LocalVersionControl({ execCommand: spawnCommand });
    }
    return this.versionControl;
  }

  async getWorkspace(): Promise<Workspace.FsWorkspace> {
    if (!this.workspace) {
      this.workspace = new Workspace.FsWorkspace(await this.getVersionControl().root());
    }
    return this.workspace;
  }

  /**
   * Repository settings; the project name defaults to the repository name.
   */
  async getSettings(upstream: string): Promise<Config.ReleaseSettings> {
    if (!this.settings) {
      const { repo } = await this.getRepository(upstream);
      this.settings = await Config.loadSettings(await this.getWorkspace(), {
        repositoryName: repo,
        editor: this.getEnvironment().editor,
      });
    }
    return this.settings;
  }

  /**
   * Changelog named by the settings file. Needs no remote: the project name
   * falls back to the checkout directory.
   */
  async getChangelog(): Promise<Changelog.Changelog> {
    const workspace = await this.getWorkspace();
    const settings = this.settings ?? await Config.loadSettings(workspace, {
      repositoryName: this.getEnvironment().repository?.repo ?? path.basename(workspace.root),
      editor: this.getEnvironment().editor,
    });
    return new Changelog.Changelog(workspace, settings.changelogFile);
  }

  /**
   * GitHub forge for the repository behind `upstream`, authenticated with
   * GITHUB_TOKEN. Ref updates use RELEASER_TOKEN so they trigger workflows.
   */
  async getForge(upstream: string): Promise<Forge.GitHubForge> {
    if (this.forge) {
      return this.forge;
    }
    const env = this.getEnvironment();
    if (!env.token) {
      throw new Error('GITHUB_TOKEN is required to talk to GitHub');
    }
    const { owner, repo } = await this.getRepository(upstream);
    const octokit = new Octokit({ auth: env.token, ...(env.apiUrl ? { baseUrl: env.apiUrl } : {}) });
    const releaserOctokit = env.releaserToken && env.releaserToken !== env.token
      ? new Octokit({ auth: env.releaserToken, ...(env.apiUrl ? { baseUrl: env.apiUrl } : {}) })
      : octokit;

    this.forge = new Forge.GitHubForge({
      octokit,
      releaserOctokit,
      owner,
      repo,
      ...(env.actor ? { actor: env.actor } : {}),
    });
    return this.forge;
  }

  async getReleaseTools(upstream: string): Promise<ReleaseTools.LocalReleaseTools> {
    const settings = await this.getSettings(upstream);
    return new ReleaseTools.LocalReleaseTools({
      execCommand: spawnCommand,
      forge: await this.getForge(upstream),
      repoRoot: (await this.getWorkspace()).root,
      projectName: settings.projectName,
      validateCommand: settings.validateCommand,
      restyleCommand: settings.restyleCommand,
      editor: settings.editor,
    });
  }

  /**
   * Orchestrator wired to the real collaborators for one run.
   */
  async getReleaseOrchestrator(config: Config.ReleaseConfig): Promise<Release.ReleaseOrchestrator> {
    return new Release.ReleaseOrchestrator(config, {
      vcs: this.getVersionControl(),
      forge: await this.getForge(config.upstream),
      workspace: await this.getWorkspace(),
      tools: await this.getReleaseTools(config.upstream),
      settings: await this.getSettings(config.upstream),
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /** GITHUB_REPOSITORY when set, else the owner and name of the upstream remote */
  private async getRepository(upstream: string): Promise<Git.RepoSlug> {
    return this.getEnvironment().repository ?? this.getVersionControl().remoteSlug(upstream);
  }
}
