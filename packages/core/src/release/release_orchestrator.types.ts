import type { IVersionControl } from '../git/version_control';
import type { IForge } from '../forge/forge';
import type { IWorkspace } from '../workspace/workspace';
import type { IReleaseTools } from '../release_tools/release_tools';
import type { ReleaseSettings } from '../config/config.types';
import type { StageRunner } from '../stage/stage';
import type { Sleep } from '../stage/stage.types';

export type ReleaseOrchestratorDependencies = {
  vcs: IVersionControl;
  forge: IForge;
  /** Working tree the changelog and release commit files are read from */
  workspace: IWorkspace;
  tools: IReleaseTools;
  settings: ReleaseSettings;
  /** Defaults to a runner reporting through the logger */
  runner?: StageRunner;
  /** Defaults to a real timer */
  sleep?: Sleep;
  /** Output of dry runs; defaults to the logger */
  print?: (line: string) => void;
};

/**
 * How a run ended without handing back to a human.
 * - completed: every stage ran
 * - verified: checks passed on the release PR (verify mode)
 * - dry-run: the release PR was described but not created
 */
export type ReleaseRunStatus = 'completed' | 'verified' | 'dry-run';

export type ReleaseRunResult = {
  version: string;
  status: ReleaseRunStatus;
};
