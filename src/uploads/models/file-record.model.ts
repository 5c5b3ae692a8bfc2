import {
  CategoryInput,
  CategoryValue,
  FileTypeCategory,
  categoryAsString,
  getCategoryLabel,
  knownCategory,
  toCategory,
  toCategoryValue,
} from '../constants/file-type-category';
import {
  UploadErrorCode,
  describeUploadError,
} from '../constants/upload-error-codes';
import { InvalidUploadInputError } from '../errors/upload-intake.error';
import type { TypeResolver } from '../types/type-resolver.interface';
import type { MultipartDescriptor } from '../types/upload-input.types';
import { parseDataUri } from '../utils/data-uri.utils';
import { extractExtension } from '../utils/filename.utils';

/**
 * Extensions that an image converter has to turn into a browser-friendly format
 */
export const FORMAT_CONVERSION_EXTENSIONS: readonly string[] = ['heic', 'heif'];

export interface FileRecordProps {
  filename: string;
  originalName: string;
  extension: string;
  mimeType?: string | null;
  fileTypeCategory?: CategoryValue;
  sourcePath?: string | null;
  dataUri?: string | null;
  size?: number | null;
  uploadErrorCode?: number;
}

function nonEmptyString(value: string | null | undefined): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function byteCount(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? Math.trunc(value)
    : null;
}

/**
 * One normalized upload, whatever its source.
 *
 * Records are frozen on construction. `sourcePath` (multipart uploads) and
 * `dataUri` (data-URI uploads) are mutually exclusive; derived copies may
 * carry neither. The record only references externally owned data, it never
 * holds open handles.
 */
export class FileRecord {
  readonly filename: string;
  readonly originalName: string;
  readonly extension: string;
  readonly mimeType: string | null;
  readonly fileTypeCategory: CategoryValue;
  readonly sourcePath: string | null;
  readonly dataUri: string | null;
  readonly size: number | null;
  readonly uploadErrorCode: number;

  constructor(props: FileRecordProps) {
    const sourcePath = props.sourcePath ?? null;
    const dataUri = props.dataUri ?? null;

    if (sourcePath !== null && dataUri !== null) {
      throw new InvalidUploadInputError(
        `File record for "${props.filename}" cannot have both a source path and a data URI`,
      );
    }

    this.filename = props.filename;
    this.originalName = props.originalName;
    this.extension = props.extension.toLowerCase();
    this.mimeType = props.mimeType ?? null;
    this.fileTypeCategory =
      props.fileTypeCategory ?? knownCategory(FileTypeCategory.UNKNOWN);
    this.sourcePath = sourcePath;
    this.dataUri = dataUri;
    this.size = props.size ?? null;
    this.uploadErrorCode = props.uploadErrorCode ?? UploadErrorCode.OK;

    Object.freeze(this);
  }

  /**
   * Build a record from a multipart descriptor. The extension comes from the
   * client-side name; missing optional fields fall back to null, UNKNOWN and
   * NO_FILE.
   */
  static fromMultipart(
    descriptor: MultipartDescriptor,
    targetFilename: string,
    category?: CategoryInput,
  ): FileRecord {
    return new FileRecord({
      filename: targetFilename,
      originalName: descriptor.name,
      extension: extractExtension(descriptor.name),
      mimeType: nonEmptyString(descriptor.type),
      fileTypeCategory: toCategoryValue(category ?? FileTypeCategory.UNKNOWN),
      sourcePath:
        nonEmptyString(descriptor.tmp_name) ?? nonEmptyString(descriptor.path),
      size: byteCount(descriptor.size),
      uploadErrorCode:
        typeof descriptor.error === 'number'
          ? descriptor.error
          : UploadErrorCode.NO_FILE,
    });
  }

  /**
   * Build a record from a data URI. The resolver fills in the extension when
   * the target filename has none, and the category when none is given.
   * Size is left unknown.
   */
  static fromDataUri(
    dataUri: string,
    targetFilename: string,
    typeResolver: TypeResolver,
    category?: CategoryInput,
  ): FileRecord {
    const mimeType = parseDataUri(dataUri)?.mimeType ?? null;

    let extension = extractExtension(targetFilename);
    if (extension === '' && mimeType !== null) {
      extension = typeResolver.extensionForMimeType(mimeType) ?? '';
    }

    return new FileRecord({
      filename: targetFilename,
      originalName: targetFilename,
      extension,
      mimeType,
      fileTypeCategory: toCategoryValue(
        category ?? typeResolver.categoryForDataUri(dataUri),
      ),
      dataUri,
      size: null,
      uploadErrorCode: UploadErrorCode.OK,
    });
  }

  isUploadFromFile(): boolean {
    return this.sourcePath !== null;
  }

  isUploadFromDataUri(): boolean {
    return this.dataUri !== null;
  }

  isUploadSuccessful(): boolean {
    return this.uploadErrorCode === UploadErrorCode.OK;
  }

  uploadErrorMessage(): string {
    return describeUploadError(this.uploadErrorCode);
  }

  resolvedCategory(): FileTypeCategory {
    return toCategory(this.fileTypeCategory);
  }

  categoryAsString(): string {
    return categoryAsString(this.fileTypeCategory);
  }

  categoryLabel(): string {
    return getCategoryLabel(this.fileTypeCategory);
  }

  isImage(): boolean {
    return this.resolvedCategory() === FileTypeCategory.IMAGE;
  }

  /**
   * Whether an external converter should turn this image into another format
   */
  needsFormatConversion(): boolean {
    return (
      this.isImage() && FORMAT_CONVERSION_EXTENSIONS.includes(this.extension)
    );
  }

  withFilename(filename: string): FileRecord {
    return new FileRecord({ ...this.toProps(), filename });
  }

  withCategory(category: CategoryInput): FileRecord {
    return new FileRecord({
      ...this.toProps(),
      fileTypeCategory: toCategoryValue(category),
    });
  }

  private toProps(): FileRecordProps {
    return {
      filename: this.filename,
      originalName: this.originalName,
      extension: this.extension,
      mimeType: this.mimeType,
      fileTypeCategory: this.fileTypeCategory,
      sourcePath: this.sourcePath,
      dataUri: this.dataUri,
      size: this.size,
      uploadErrorCode: this.uploadErrorCode,
    };
  }
}
