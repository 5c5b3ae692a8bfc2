import { Inject, Injectable } from '@nestjs/common';
import * as mime from 'mime-types';
import { FileTypeCategory } from '../constants/file-type-category';
import { SUPPORTED_TYPE_TABLE } from '../supported-type-table.provider';
import type { TypeResolver } from '../types/type-resolver.interface';
import type { TypeTable } from '../types/type-table.interface';
import { parseBase64DataUri } from '../utils/data-uri.utils';

@Injectable()
export class TypeResolverService implements TypeResolver {
  constructor(
    @Inject(SUPPORTED_TYPE_TABLE)
    private readonly typeTable: TypeTable,
  ) {}

  /**
   * Canonical extension for a MIME type, null when the table does not map it
   */
  extensionForMimeType(mimeType: string): string | null {
    return this.typeTable.findByMimeType(mimeType)?.extensions[0] ?? null;
  }

  categoryForMimeType(mimeType: string): FileTypeCategory {
    return (
      this.typeTable.findByMimeType(mimeType)?.category ??
      FileTypeCategory.UNKNOWN
    );
  }

  /**
   * Category of the MIME type embedded in a `data:<mime>;base64,` URI
   */
  categoryForDataUri(dataUri: string): FileTypeCategory {
    const parsed = parseBase64DataUri(dataUri);
    return parsed
      ? this.categoryForMimeType(parsed.mimeType)
      : FileTypeCategory.UNKNOWN;
  }

  categoryForExtension(extension: string): FileTypeCategory {
    return (
      this.typeTable.findByExtension(extension)?.category ??
      FileTypeCategory.UNKNOWN
    );
  }

  labelForMimeType(mimeType: string): string | null {
    return this.typeTable.findByMimeType(mimeType)?.label ?? null;
  }

  /**
   * MIME type for an extension: the type table first, then the mime-types
   * database for types outside the table
   */
  mimeTypeForExtension(extension: string): string | null {
    const supported = this.typeTable.findByExtension(extension);
    if (supported) {
      return supported.mimeType;
    }

    const detected = mime.lookup(extension);
    return detected || null;
  }
}
