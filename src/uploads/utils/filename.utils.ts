/**
 * Filename sanitization helpers
 */

export const DEFAULT_FILENAME_MAX_LENGTH = 200;
export const FALLBACK_FILENAME = 'unnamed';

// Path separators plus characters that break shells, URLs or common filesystems
const UNSAFE_FILENAME_CHARACTERS = [
  '\\',
  '/',
  ':',
  '*',
  '?',
  '"',
  '<',
  '>',
  '|',
  '#',
  '%',
  '&',
  '+',
  '=',
  ';',
  '!',
  '@',
  '$',
  '^',
  '`',
  '~',
] as const;

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;
const EDGE_DOTS_AND_SPACES = /^[. ]+|[. ]+$/g;
const TRAILING_HIGH_SURROGATE = /[\ud800-\udbff]$/;

export interface SanitizeFilenameOptions {
  removeUnderscores?: boolean;
  removeSpaces?: boolean;
  removeCustomChars?: readonly string[];
  maxLength?: number;
}

function removeAll(input: string, characters: readonly string[]): string {
  return characters.reduce(
    (result, character) =>
      character ? result.replaceAll(character, '') : result,
    input,
  );
}

/**
 * Remove null bytes, C0 and C1 control characters
 */
export function removeControlCharacters(input: string): string {
  return input.replace(CONTROL_CHARACTERS, '');
}

/**
 * Make a candidate filename safe to use as a single path segment
 */
export function sanitizeFilename(
  filename: string,
  options: SanitizeFilenameOptions = {},
): string {
  const maxLength = options.maxLength ?? DEFAULT_FILENAME_MAX_LENGTH;

  let result = filename.normalize('NFC');

  if (options.removeUnderscores) {
    result = result.replaceAll('_', '');
  }

  if (options.removeSpaces) {
    result = result.replaceAll(' ', '');
  }

  if (options.removeCustomChars && options.removeCustomChars.length > 0) {
    result = removeAll(result, options.removeCustomChars);
  }

  result = removeAll(result, UNSAFE_FILENAME_CHARACTERS);
  result = removeControlCharacters(result);
  result = result.replace(EDGE_DOTS_AND_SPACES, '');

  if (result === '') {
    result = FALLBACK_FILENAME;
  }

  if (result.length > maxLength) {
    const dotIndex = result.lastIndexOf('.');
    const extension = dotIndex > 0 ? result.slice(dotIndex) : '';
    const baseName = dotIndex > 0 ? result.slice(0, dotIndex) : result;
    const maxBaseLength = Math.max(0, maxLength - extension.length);

    // Never split a surrogate pair
    const truncated = baseName.slice(0, maxBaseLength);
    result = truncated.replace(TRAILING_HIGH_SURROGATE, '') + extension;
  }

  if (result.trim() === '' || result === '.') {
    result = FALLBACK_FILENAME;
  }

  return result;
}

function basename(filename: string): string {
  const separatorIndex = Math.max(
    filename.lastIndexOf('/'),
    filename.lastIndexOf('\\'),
  );
  return filename.slice(separatorIndex + 1);
}

/**
 * Lowercase extension after the final dot of the basename, '' when absent
 */
export function extractExtension(filename: string): string {
  const name = basename(filename);
  const dotIndex = name.lastIndexOf('.');
  return dotIndex === -1 ? '' : name.slice(dotIndex + 1).toLowerCase();
}

/**
 * Split `report.final.pdf` into `report.final` and `.pdf`.
 * Dot-files such as `.env` have no extension here.
 */
export function splitFilename(filename: string): {
  baseName: string;
  extension: string;
} {
  const dotIndex = filename.lastIndexOf('.');
  if (dotIndex <= 0) {
    return { baseName: filename, extension: '' };
  }

  return {
    baseName: filename.slice(0, dotIndex),
    extension: filename.slice(dotIndex),
  };
}
