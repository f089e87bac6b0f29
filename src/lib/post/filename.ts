/**
 * Post filename parsing
 *
 * Post filenames look like:
 *   2008-11-05-my-awesome-post.md
 *   2008-11-05_12-45-my-awesome-post.md
 *   ruby/2008-11-05-my-awesome-post.md   (topic directories inside _posts)
 */

/** Optional directories, date with optional `_HH-MM`, slug, extension */
export const FILENAME_PATTERN = /^(?:.+\/)*(\d+-\d+-\d+(?:_\d+-\d+)?)-([^/]+)(\.[^./]+)$/;

export type ParsedFilename =
  | {
      kind: 'parsed';
      date: Date;
      slug: string;
      /** Extension including the leading dot, e.g. ".md" */
      extension: string;
      /** Directories before the file name */
      topics: string[];
    }
  | { kind: 'invalid'; reason: string };

/**
 * Cheap pre-check used to filter a directory listing before constructing posts.
 * Never throws.
 */
export function isValidPostFilename(name: string): boolean {
  return FILENAME_PATTERN.test(name);
}

/**
 * Parses "YYYY-MM-DD" or "YYYY-MM-DD HH:MM" into a local-time Date.
 * Returns null when a component is out of range.
 */
export function parseFilenameDate(value: string): Date | null {
  const match = /^(\d+)-(\d+)-(\d+)(?: (\d+):(\d+))?$/.exec(value);
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText = '0', minuteText = '0'] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);

  if (hour > 23 || minute > 59) {
    return null;
  }

  // setFullYear keeps two-digit years literal
  const date = new Date(2000, 0, 1, 0, 0, 0, 0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hour, minute, 0, 0);

  // Date rolls over silently (Feb 30 -> Mar 2); reject instead
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }

  return date;
}

/**
 * Decomposes a post filename into date, slug, extension and topics
 */
export function parsePostFilename(name: string): ParsedFilename {
  const match = FILENAME_PATTERN.exec(name);
  if (!match) {
    return { kind: 'invalid', reason: `"${name}" does not match YYYY-MM-DD-slug.ext` };
  }

  const [, dateText, slug, extension] = match;

  // The optional time suffix goes through the same parser as plain dates
  const date = parseFilenameDate(dateText.replace(/_(\d+)-(\d+)$/, ' $1:$2'));
  if (!date) {
    return { kind: 'invalid', reason: `"${dateText}" is not a valid date` };
  }

  const parts = name.split('/');

  return {
    kind: 'parsed',
    date,
    slug,
    extension,
    topics: parts.slice(0, -1),
  };
}
