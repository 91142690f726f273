/**
 * Filename and folder-name sanitization for downloaded tracks
 */

/** Characters that Windows, macOS or Linux refuse in a path segment */
export const FORBIDDEN_FILENAME_CHARS = ['<', '>', ':', '"', '/', '\\', '|', '?', '*'];

export const MAX_FILENAME_LENGTH = 100;
export const MAX_FOLDER_NAME_LENGTH = 150;
export const UNKNOWN_TRACK_STEM = 'unknown_track';
export const UNKNOWN_FOLDER_NAME = 'Unknown Folder';

export class FilenameSanitizer {
  /**
   * Reduce arbitrary text to a safe, ASCII-only path segment.
   * Returns '' when nothing printable survives.
   */
  static sanitizeSegment(input: string, maxLength: number): string {
    if (!input) return '';

    // Fold to ASCII first so compatibility forms (e.g. fullwidth "？") cannot
    // reappear as forbidden characters later
    let sanitized = input.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');

    for (const char of FORBIDDEN_FILENAME_CHARS) {
      sanitized = sanitized.split(char).join('_');
    }

    sanitized = sanitized
      .replace(/[\x00-\x1F]/g, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (sanitized.length > maxLength) {
      sanitized = sanitized.slice(0, maxLength).trimEnd();
    }

    return sanitized;
  }

  /**
   * Stem used for a track file, derived from the title alone
   */
  static sanitizeTitle(title: string | null | undefined): string {
    if (!title || title === 'Unknown') {
      return UNKNOWN_TRACK_STEM;
    }
    return this.sanitizeSegment(title, MAX_FILENAME_LENGTH) || UNKNOWN_TRACK_STEM;
  }

  /**
   * e.g. "Song: Title?" -> "Song_ Title_.opus"
   */
  static createSafeFilename(title: string | null | undefined, extension = 'opus'): string {
    return `${this.sanitizeTitle(title)}.${extension}`;
  }

  static createSafeFolderName(name: string | null | undefined): string {
    if (!name || name === 'Unknown') {
      return UNKNOWN_FOLDER_NAME;
    }
    return this.sanitizeSegment(name, MAX_FOLDER_NAME_LENGTH) || UNKNOWN_FOLDER_NAME;
  }
}
