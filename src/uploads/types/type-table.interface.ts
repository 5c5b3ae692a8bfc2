import { FileTypeCategory } from '../constants/file-type-category';

export interface SupportedFileType {
  mimeType: string;
  /**
   * First entry is the canonical extension
   */
  extensions: readonly string[];
  category: FileTypeCategory;
  label: string;
}

/**
 * Read-only MIME ↔ extension ↔ category lookup table
 */
export interface TypeTable {
  findByMimeType(mimeType: string): SupportedFileType | null;

  findByExtension(extension: string): SupportedFileType | null;

  entries(): readonly SupportedFileType[];
}
