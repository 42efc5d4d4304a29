/**
 * Filename Parser
 *
 * Extracts artist and title from a filename using a user-supplied pattern
 * such as "{artist} - {title}" or "{title} by {artist}".
 */

import * as path from 'path';
import type { ParsedName } from '../../shared/types';
import { InputError } from './errors';

const ARTIST_PLACEHOLDER = '{artist}';
const TITLE_PLACEHOLDER = '{title}';

/** Matches either placeholder, capturing it so split() keeps it */
const PLACEHOLDER_SPLIT = /(\{artist\}|\{title\})/;

/**
 * Escapes regex syntax characters so a string matches literally, also under
 * the `u` flag, which rejects escapes of anything else.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Counts non-overlapping occurrences of `needle` in `haystack`.
 */
function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Compiles a filename pattern into an anchored, case-insensitive RegExp.
 *
 * `{artist}` becomes a non-greedy capture and `{title}` a greedy one; all
 * other characters match literally. Captures split on code points, never
 * inside a surrogate pair.
 *
 * @throws InputError if the pattern does not contain each placeholder exactly once
 */
export function compileFilenamePattern(pattern: string): RegExp {
  const artistCount = countOccurrences(pattern, ARTIST_PLACEHOLDER);
  const titleCount = countOccurrences(pattern, TITLE_PLACEHOLDER);

  if (artistCount !== 1 || titleCount !== 1) {
    throw new InputError(
      `Pattern must contain {artist} and {title} exactly once each, got: '${pattern}'`,
      { step: 'parsing' },
    );
  }

  const source = pattern
    .split(PLACEHOLDER_SPLIT)
    .map((part) => {
      if (part === ARTIST_PLACEHOLDER) return '(?<artist>.+?)';
      if (part === TITLE_PLACEHOLDER) return '(?<title>.+)';
      return escapeRegExp(part);
    })
    .join('');

  return new RegExp(`^${source}$`, 'iu');
}

/**
 * Returns the filename without its directory and last extension.
 * "music/Pink Floyd - Money.mp3" → "Pink Floyd - Money"
 */
export function filenameStem(filename: string): string {
  return path.parse(filename).name;
}

/**
 * Matches a filename against a compiled pattern.
 *
 * @returns The trimmed artist and title, or null when the filename does not match
 */
export function matchFilename(filename: string, regex: RegExp): ParsedName | null {
  const match = regex.exec(filenameStem(filename));
  const artist = match?.groups?.artist;
  const title = match?.groups?.title;

  if (artist === undefined || title === undefined) {
    return null;
  }

  return {
    artist: artist.trim(),
    title: title.trim(),
  };
}

/**
 * Parses artist and title from a filename using a pattern.
 *
 * Adjacent placeholders ("{artist}{title}") are accepted, but the split
 * between them is best effort.
 *
 * @param filename - Filename or path; the extension is ignored
 * @param pattern - Pattern containing {artist} and {title}
 * @returns The trimmed artist and title, or null when the filename does not match
 * @throws InputError if the pattern itself is invalid
 */
export function parseFilename(filename: string, pattern: string): ParsedName | null {
  return matchFilename(filename, compileFilenamePattern(pattern));
}
