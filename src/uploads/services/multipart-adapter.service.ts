import { Injectable, Logger } from '@nestjs/common';
import { CategoryInput } from '../constants/file-type-category';
import { UploadErrorCode } from '../constants/upload-error-codes';
import { InvalidUploadInputError } from '../errors/upload-intake.error';
import { FileRecord } from '../models/file-record.model';
import type {
  MulterFile,
  MultipartDescriptor,
  MultipartFileList,
} from '../types/upload-input.types';
import { extractExtension } from '../utils/filename.utils';
import {
  expandMultipartFileList,
  isMultipartFileList,
} from '../utils/multipart.utils';
import { FilenameSanitizerService } from './filename-sanitizer.service';
import { TypeResolverService } from './type-resolver.service';

function assertMultipartDescriptor(
  value: unknown,
): asserts value is MultipartDescriptor {
  if (typeof value !== 'object' || value === null) {
    throw new InvalidUploadInputError('Multipart descriptor must be an object');
  }
  if (!('name' in value) || typeof value.name !== 'string') {
    throw new InvalidUploadInputError(
      'Multipart descriptor must have a string name',
    );
  }
}

@Injectable()
export class MultipartAdapterService {
  private readonly logger = new Logger(MultipartAdapterService.name);

  constructor(
    private readonly filenameSanitizer: FilenameSanitizerService,
    private readonly typeResolver: TypeResolverService,
  ) {}

  /**
   * Map a multipart descriptor to a FileRecord
   * @param descriptor - Descriptor from the transport layer
   * @param targetFilename - Desired filename; defaults to the client-side name
   * @param category - Category override; otherwise resolved from the extension
   */
  adapt(
    descriptor: MultipartDescriptor,
    targetFilename = '',
    category?: CategoryInput,
  ): FileRecord {
    assertMultipartDescriptor(descriptor);

    const filename = this.filenameSanitizer.sanitize(
      targetFilename || descriptor.name,
    );
    const resolvedCategory =
      category ??
      this.typeResolver.categoryForExtension(
        extractExtension(descriptor.name),
      );

    const record = FileRecord.fromMultipart(
      descriptor,
      filename,
      resolvedCategory,
    );

    if (!record.isUploadSuccessful()) {
      this.logger.warn(
        `Upload of "${record.originalName}" failed: ${record.uploadErrorMessage()}`,
      );
    }

    return record;
  }

  /**
   * Adapt a single or multi-file form upload. Target filenames pair with the
   * files by position; files without one keep their client-side name.
   */
  adaptAll(
    input: MultipartDescriptor | MultipartFileList,
    targetFilenames: readonly string[] = [],
    category?: CategoryInput,
  ): FileRecord[] {
    if (typeof input !== 'object' || input === null) {
      throw new InvalidUploadInputError('Multipart upload must be an object');
    }

    const descriptors = isMultipartFileList(input)
      ? expandMultipartFileList(input)
      : [input];

    return descriptors.map((descriptor, index) =>
      this.adapt(descriptor, targetFilenames[index] ?? '', category),
    );
  }

  /**
   * Map a file stored by Multer's disk storage. Multer only hands over files
   * that arrived completely, so the error code is always OK.
   */
  adaptMulterFile(
    file: MulterFile,
    targetFilename = '',
    category?: CategoryInput,
  ): FileRecord {
    return this.adapt(
      {
        name: file.originalname,
        path: file.path,
        size: file.size,
        type: file.mimetype,
        error: UploadErrorCode.OK,
      },
      targetFilename,
      category,
    );
  }
}
