import { FileTypeCategory } from '../constants/file-type-category';

/**
 * MIME / data-URI classification used by the record factories.
 * Implementations never throw: unmapped input resolves to null or UNKNOWN.
 */
export interface TypeResolver {
  extensionForMimeType(mimeType: string): string | null;

  categoryForDataUri(dataUri: string): FileTypeCategory;
}
