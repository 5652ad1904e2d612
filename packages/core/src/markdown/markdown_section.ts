/**
 * Structured editing of markdown documents (issue and PR bodies).
 *
 * @module markdown
 */

const HEADER_REGEX = /^(#{1,6})\s/;

/** Thematic break closing a section that was put in front of other text */
export const SECTION_BREAK = '---';

/** Level of a markdown ATX header line, or 0 for any other line */
export function headerLevel(line: string): number {
  const match = HEADER_REGEX.exec(line);
  return match?.[1] ? match[1].length : 0;
}

/**
 * Replaces the section starting at `header` with `header` + `content`.
 *
 * The section runs until the next header of the same or a higher level, a
 * `---` line, or the end of the body. A missing section is prepended and,
 * unless the body already starts at such a boundary, closed with `---` so
 * the text after it survives the next patch.
 */
export function patchSection(body: string, header: string, content: string): string {
  const level = headerLevel(header);
  if (level === 0) {
    throw new Error(`Not a markdown header: ${header}`);
  }

  const section = [header, '', ...content.trim().split('\n')];
  const lines = body.split('\n');
  const start = lines.findIndex((line) => line.trimEnd() === header);

  if (start === -1) {
    if (body.trim() === '') {
      return `${section.join('\n')}\n`;
    }
    const first = lines.find((line) => line.trim() !== '') ?? '';
    if (isBoundary(first, level)) {
      return [...section, '', body].join('\n');
    }
    return [...section, '', SECTION_BREAK, '', body].join('\n');
  }

  let end = lines.length;
  for (let i = start + 1; i < lines.length; i++) {
    if (isBoundary(lines[i] ?? '', level)) {
      end = i;
      break;
    }
  }

  const before = lines.slice(0, start);
  const after = lines.slice(end);
  if (after.length === 0) {
    return [...before, ...section, ''].join('\n');
  }
  return [...before, ...section, '', ...after].join('\n');
}

function isBoundary(line: string, level: number): boolean {
  if (line.trimEnd() === SECTION_BREAK) {
    return true;
  }
  const current = headerLevel(line);
  return current > 0 && current <= level;
}

/**
 * Text of the section under `header` (without the header line), or null
 * when the body has no such section.
 */
export function getSection(body: string, header: string): string | null {
  const level = headerLevel(header);
  const lines = body.split('\n');
  const start = lines.findIndex((line) => line.trimEnd() === header);
  if (start === -1) {
    return null;
  }
  const rest = lines.slice(start + 1);
  const end = rest.findIndex((line) => isBoundary(line, level));
  return (end === -1 ? rest : rest.slice(0, end)).join('\n').trim();
}

/**
 * Replaces the text between two marker lines, keeping the markers. Returns
 * null when either marker is missing so callers can fall back.
 */
export function replaceBetweenMarkers(
  body: string,
  startMarker: string,
  endMarker: string,
  content: string,
): string | null {
  const start = body.indexOf(startMarker);
  const end = body.indexOf(endMarker, start + startMarker.length);
  if (start === -1 || end === -1) {
    return null;
  }
  return `${body.slice(0, start)}${startMarker}\n${content.trim()}\n${body.slice(end)}`;
}
