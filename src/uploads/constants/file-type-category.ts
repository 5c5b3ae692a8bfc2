/**
 * File type categories
 * Canonical tags used for labeling, filtering and conversion decisions.
 * Records may also carry a raw (non-canonical) category string; `toCategory`
 * resolves it only when it matches a tag exactly.
 */
export enum FileTypeCategory {
  IMAGE = 'image',
  DOCUMENT = 'document',
  VIDEO = 'video',
  AUDIO = 'audio',
  ARCHIVE = 'archive',
  UNKNOWN = 'unknown',
}

export const UNKNOWN_CATEGORY_LABEL = 'Unknown File Type';

const CATEGORY_LABELS: Record<FileTypeCategory, string> = {
  [FileTypeCategory.IMAGE]: 'Images',
  [FileTypeCategory.DOCUMENT]: 'Documents',
  [FileTypeCategory.VIDEO]: 'Videos',
  [FileTypeCategory.AUDIO]: 'Audio Files',
  [FileTypeCategory.ARCHIVE]: 'Archives',
  [FileTypeCategory.UNKNOWN]: UNKNOWN_CATEGORY_LABEL,
};

const CANONICAL_CATEGORIES = new Map<string, FileTypeCategory>(
  Object.values(FileTypeCategory).map((category): [string, FileTypeCategory] => [
    category,
    category,
  ]),
);

/**
 * Category as stored on a record: either a canonical tag or a raw string
 * kept verbatim for forward-compatibility.
 */
export type CategoryValue =
  | { readonly kind: 'known'; readonly category: FileTypeCategory }
  | { readonly kind: 'raw'; readonly value: string };

/**
 * Accepted wherever a category is passed in
 */
export type CategoryInput = FileTypeCategory | string;

export function knownCategory(category: FileTypeCategory): CategoryValue {
  return { kind: 'known', category };
}

export function rawCategory(value: string): CategoryValue {
  return { kind: 'raw', value };
}

/**
 * Build a category value from caller input. Exact canonical tags become
 * `known`, everything else is kept as `raw`.
 */
export function toCategoryValue(input: CategoryInput): CategoryValue {
  const canonical = CANONICAL_CATEGORIES.get(input);
  return canonical ? knownCategory(canonical) : rawCategory(input);
}

/**
 * Check whether a string is one of the canonical category tags
 */
export function isFileTypeCategory(value: string): value is FileTypeCategory {
  return CANONICAL_CATEGORIES.has(value);
}

/**
 * Resolve a category value to a canonical tag. Lookup is exact, so `'Image'`
 * or `' image'` resolve to UNKNOWN.
 */
export function toCategory(value: CategoryValue): FileTypeCategory {
  if (value.kind === 'known') {
    return value.category;
  }

  return CANONICAL_CATEGORIES.get(value.value) ?? FileTypeCategory.UNKNOWN;
}

export function categoryAsString(value: CategoryValue): string {
  return value.kind === 'known' ? value.category : value.value;
}

export function getCategoryLabel(value: CategoryValue): string {
  return CATEGORY_LABELS[toCategory(value)];
}
