export const UNKNOWN_SIZE_LABEL = 'Unknown size';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Format a byte count with 1024-based units, e.g. "500 B", "1.5 KB".
 * Values are rounded to two decimals; TB is the largest unit.
 */
export function formatFileSize(size: number | null): string {
  if (size === null) {
    return UNKNOWN_SIZE_LABEL;
  }

  let value = size;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${Math.round(value * 100) / 100} ${SIZE_UNITS[unitIndex]}`;
}
