/**
 * Header comment parsing.
 *
 * Recognises the field markers used in script headers:
 *
 *   #   DESCRIPTION:  Master indexer for the repository that creates a
 *   #                 searchable database of all functions.
 *   #         USAGE:  index_build
 *
 * A field runs from its marker to the next marker, a blank comment line or a
 * separator rule. Only the leading comment block is considered.
 */

export interface HeaderFields {
  description: string;
  usage: string;
  requirements: string;
  version: string;
  author: string;
}

export type HeaderField = keyof HeaderFields;

/** Upper bound for the free-text fields kept in the index. */
export const MAX_TEXT_LENGTH = 150;

const FIELD_MARKERS: Record<string, HeaderField> = {
  DESCRIPTION: "description",
  USAGE: "usage",
  REQUIREMENTS: "requirements",
  VERSION: "version",
  AUTHOR: "author",
};

const KNOWN_MARKER = /^(DESCRIPTION|USAGE|REQUIREMENTS|VERSION|AUTHOR)\s*:\s*(.*)$/i;
// Any other upper-case marker (FILE:, NOTES:, OPTIONS:) ends the current field.
const OTHER_MARKER = /^[A-Z][A-Z0-9 _-]*:(\s|$)/;
const SEPARATOR = /^[=\-*~_#]{3,}$/;
const ABOUT_LINE = /^\s*about(?:-[a-z]+)?\s+(['"])(.*?)\1/m;

export function emptyHeader(): HeaderFields {
  return { description: "", usage: "", requirements: "", version: "", author: "" };
}

/** Strip the comment leader and surrounding whitespace from a comment line. */
export function stripCommentLeader(line: string): string {
  return line.replace(/^\s*#+/, "").trim();
}

function isComment(line: string): boolean {
  return /^\s*#/.test(line);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncate(text: string, max: number = MAX_TEXT_LENGTH): string {
  return text.length > max ? text.slice(0, max).trimEnd() : text;
}

/** The leading comment lines of a file, shebang and leading blanks skipped. */
export function headerLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  let start = 0;
  if (lines[0]?.startsWith("#!")) start = 1;
  while (start < lines.length && lines[start]?.trim() === "") start++;

  const block: string[] = [];
  for (let i = start; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (!isComment(line)) break;
    block.push(line);
  }
  return block;
}

/**
 * Parse the structured header of a script. Missing or malformed fields come
 * back as empty strings; this never throws.
 */
export function parseHeader(source: string): HeaderFields {
  const collected: Partial<Record<HeaderField, string[]>> = {};
  let current: string[] | null = null;

  for (const line of headerLines(source)) {
    const text = stripCommentLeader(line);

    if (text === "" || SEPARATOR.test(text)) {
      current = null;
      continue;
    }

    const known = KNOWN_MARKER.exec(text);
    if (known) {
      const field = FIELD_MARKERS[(known[1] ?? "").toUpperCase()];
      if (field === undefined || collected[field] !== undefined) {
        // Repeated marker: first occurrence wins, ignore its continuation too.
        current = null;
        continue;
      }
      current = [known[2] ?? ""];
      collected[field] = current;
      continue;
    }

    if (OTHER_MARKER.test(text)) {
      current = null;
      continue;
    }

    current?.push(text);
  }

  const fields = emptyHeader();
  for (const field of Object.values(FIELD_MARKERS)) {
    const parts = collected[field];
    if (parts) fields[field] = collapseWhitespace(parts.join(" "));
  }
  fields.description = truncate(fields.description);
  fields.usage = truncate(fields.usage);
  return fields;
}

/**
 * bash-it style `about-alias 'text'` / `about-plugin 'text'` description,
 * used when a file carries no DESCRIPTION marker.
 */
export function parseAboutLine(source: string): string {
  const match = ABOUT_LINE.exec(source);
  return match ? truncate(collapseWhitespace(match[2] ?? "")) : "";
}
