/**
 * Release progress dashboard
 *
 * Renders the five release milestones as a markdown checklist. The output
 * depends only on the arguments, so re-rendering after a restart yields the
 * same text as long as the external state is the same.
 *
 * @module dashboard
 */

import { patchSection, replaceBetweenMarkers } from '../markdown/markdown_section';

export const RELEASE_MILESTONES = [
  'Preparation',
  'Review',
  'Tagging',
  'Binaries',
  'Publication',
] as const;

export type ReleaseMilestone = (typeof RELEASE_MILESTONES)[number];

export const DASHBOARD_HEADER = '### Release progress';
export const DASHBOARD_START = '<!-- Releaser:dashboard:start -->';
export const DASHBOARD_END = '<!-- Releaser:dashboard:end -->';

export function isReleaseMilestone(name: string): name is ReleaseMilestone {
  return RELEASE_MILESTONES.some((milestone) => milestone === name);
}

/**
 * Checklist for the given progress.
 *
 * @param done - Milestones with external evidence of completion
 * @param current - Milestone being worked on, if any
 * @param instruction - What the human has to do next, if anything
 */
export function renderDashboard(
  done: ReadonlySet<string> | readonly string[],
  current: string | null,
  instruction: string | null,
): string {
  const doneSet = new Set(done);
  const lines: string[] = [];

  for (const milestone of RELEASE_MILESTONES) {
    const box = doneSet.has(milestone) ? '[x]' : '[ ]';
    if (milestone !== current) {
      lines.push(`- ${box} ${milestone}`);
      continue;
    }
    lines.push(`- ${box} **Current Step: ${milestone}**`);
    if (instruction) {
      const [first = '', ...rest] = instruction.split('\n');
      lines.push(`  > **Action Required:** ${first}`);
      for (const line of rest) {
        lines.push(`  > ${line}`);
      }
    }
  }

  return lines.join('\n');
}

/**
 * Puts a rendered dashboard into an issue body. An existing dashboard is
 * replaced between its markers; otherwise a progress section is patched in.
 */
export function patchDashboard(body: string, rendered: string): string {
  const replaced = replaceBetweenMarkers(body, DASHBOARD_START, DASHBOARD_END, rendered);
  if (replaced !== null) {
    return replaced;
  }
  return patchSection(body, DASHBOARD_HEADER, `${DASHBOARD_START}\n${rendered}\n${DASHBOARD_END}`);
}

/**
 * Fills in milestones implied by a later completed one.
 */
export function impliedMilestones(done: ReadonlySet<ReleaseMilestone>): Set<ReleaseMilestone> {
  const result = new Set<ReleaseMilestone>();
  let reached = false;
  for (let i = RELEASE_MILESTONES.length - 1; i >= 0; i--) {
    const milestone = RELEASE_MILESTONES[i];
    if (milestone === undefined) continue;
    if (reached || done.has(milestone)) {
      reached = true;
      result.add(milestone);
    }
  }
  return result;
}
