/**
 * Adds `entry` as a line of a .gitignore file unless an identical line is
 * already there. Returns null when nothing had to change.
 */
export function ensureGitignoreEntry(contents: string | null, entry: string): string | null {
  const current = contents ?? '';
  const lines = current.split('\n').map((line) => line.trim());
  if (lines.includes(entry.trim())) {
    return null;
  }
  const separator = current === '' || current.endsWith('\n') ? '' : '\n';
  return `${current}${separator}${entry.trim()}\n`;
}
