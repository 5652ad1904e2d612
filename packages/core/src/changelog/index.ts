export {
  DEFAULT_CHANGELOG_FILE,
  ISSUE_RELEASE_NOTES_HEADER,
  Changelog,
  ReleaseNotesNotFoundError,
  formatReleaseNotes,
  parseChangelog,
  setReleaseNotesText,
  extractIssueReleaseNotes,
} from './changelog';
export type { ReleaseNotes } from './changelog';
