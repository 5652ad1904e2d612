/**
 * CHANGELOG.md release notes
 *
 * A version entry looks like:
 *
 * ```markdown
 * <a name="v0.1.3-rc.1"></a>
 * ## v0.1.3-rc.1 (2025-02-14)
 *
 * ### Release notes
 *
 * Some release notes here.
 *
 * #### Features
 *
 * - ...
 * ```
 *
 * The `###` header and the text up to the first `####` header are the
 * release notes; the rest of the entry is the generated changelog.
 *
 * @module changelog
 */

import type { IWorkspace } from '../workspace/workspace';

export const DEFAULT_CHANGELOG_FILE = 'CHANGELOG.md';

export const ISSUE_RELEASE_NOTES_HEADER = '### Release notes';

export type ReleaseNotes = {
  version: string;
  date: string;
  header: string;
  notes: string;
  changelog: string;
};

export function formatReleaseNotes(notes: ReleaseNotes): string {
  let text = `${notes.header}\n`;
  if (notes.notes) {
    text += `\n${notes.notes}\n`;
  }
  if (notes.changelog) {
    text += `\n${notes.changelog}\n`;
  }
  return text;
}

export function parseChangelog(content: string): Map<string, ReleaseNotes> {
  const entries = new Map<string, ReleaseNotes>();

  let version = '';
  let date = '';
  let header = '';
  let notes = '';
  let changelog = '';
  let inReleaseNotes = false;
  let inChangelog = false;

  const flush = (): void => {
    entries.set(version, {
      version,
      date,
      header,
      notes: notes.trim(),
      changelog: changelog.trim(),
    });
  };

  for (const line of content.split('\n')) {
    if (inReleaseNotes) {
      if (line.startsWith('####')) {
        inReleaseNotes = false;
        inChangelog = true;
      } else if (line.startsWith('<a name=')) {
        inReleaseNotes = false;
        flush();
      } else {
        notes += `${line}\n`;
        continue;
      }
    }
    if (inChangelog) {
      if (line.startsWith('<a name=')) {
        inChangelog = false;
        flush();
      } else {
        changelog += `${line}\n`;
        continue;
      }
    }
    if (line.startsWith('## ')) {
      if (version) {
        flush();
      }
      version = line.split(' ')[1] ?? '';
      date = /\(([^)]*)\)/.exec(line)?.[1] ?? '';
      header = '';
      notes = '';
      changelog = '';
    }
    if (line.startsWith('### ')) {
      header = line;
      notes = '';
      inReleaseNotes = true;
    }
  }

  if (version) {
    flush();
  }
  return entries;
}

/**
 * Inserts `notes` after the `## <version>` header, replacing anything up to
 * the next version anchor or the first `####` header.
 */
export function setReleaseNotesText(content: string, version: string, notes: string): string {
  const updated: string[] = [];
  let inReleaseNotes = false;
  let wroteNotes = false;

  const lines = content.endsWith('\n') ? content.slice(0, -1).split('\n') : content.split('\n');
  for (const line of lines) {
    if (inReleaseNotes) {
      if (!wroteNotes) {
        updated.push(`\n${notes.trim()}\n`);
        wroteNotes = true;
      }
      if (line.startsWith('<a name=') || line.startsWith('####')) {
        inReleaseNotes = false;
      } else {
        continue;
      }
    }
    updated.push(line);
    if (line.startsWith(`## ${version}`)) {
      inReleaseNotes = true;
    }
  }
  if (inReleaseNotes && !wroteNotes) {
    updated.push(`\n${notes.trim()}\n`);
  }

  return `${updated.join('\n')}\n`;
}

/**
 * The `### Release notes` section of a tracking issue body, header
 * included, or an empty string.
 */
export function extractIssueReleaseNotes(body: string): string {
  const start = body.indexOf(ISSUE_RELEASE_NOTES_HEADER);
  if (start === -1) {
    return '';
  }
  const end = body.indexOf('### ', start + 1);
  return (end === -1 ? body.slice(start) : body.slice(start, end)).trim();
}

export class ReleaseNotesNotFoundError extends Error {
  constructor(public readonly version: string, public readonly file: string) {
    super(`No release notes for ${version} in ${file}`);
    this.name = 'ReleaseNotesNotFoundError';
    Object.setPrototypeOf(this, ReleaseNotesNotFoundError.prototype);
  }
}

/**
 * The changelog file of a workspace.
 */
export class Changelog {
  private readonly workspace: IWorkspace;
  readonly file: string;

  constructor(workspace: IWorkspace, file: string = DEFAULT_CHANGELOG_FILE) {
    this.workspace = workspace;
    this.file = file;
  }

  async parse(): Promise<Map<string, ReleaseNotes>> {
    const content = await this.workspace.readFile(this.file);
    return parseChangelog(content ?? '');
  }

  async hasReleaseNotes(version: string): Promise<boolean> {
    return (await this.parse()).has(version);
  }

  async getReleaseNotes(version: string): Promise<ReleaseNotes> {
    const notes = (await this.parse()).get(version);
    if (!notes) {
      throw new ReleaseNotesNotFoundError(version, this.file);
    }
    return notes;
  }

  async setReleaseNotes(version: string, notes: string): Promise<void> {
    const content = await this.workspace.readFile(this.file);
    await this.workspace.writeFile(this.file, setReleaseNotesText(content ?? '', version, notes));
  }
}
