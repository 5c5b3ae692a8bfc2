import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataUriInfo } from '../models/data-uri-info.model';
import { SUPPORTED_TYPE_TABLE } from '../supported-type-table.provider';
import type { TypeTable } from '../types/type-table.interface';
import {
  decodedBase64Size,
  parseBase64DataUri,
} from '../utils/data-uri.utils';
import { extractExtension } from '../utils/filename.utils';
import { FilenameSanitizerService } from './filename-sanitizer.service';

export const DATA_URI_DEFAULT_BASENAME = 'data_uri_file';

const DEFAULT_MAX_FILE_SIZE_MB = 100;

/**
 * Standalone data-URI intake. Unlike FileRecord.fromDataUri it needs no
 * TypeResolver: it reads the type table directly, synthesizes a filename when
 * none is given and computes the decoded size eagerly.
 */
@Injectable()
export class DataUriParserService {
  private readonly logger = new Logger(DataUriParserService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    @Inject(SUPPORTED_TYPE_TABLE)
    private readonly typeTable: TypeTable,
    private readonly filenameSanitizer: FilenameSanitizerService,
    private readonly configService: ConfigService,
  ) {
    const maxFileSizeMB = Number(
      this.configService.get<number>(
        'UPLOAD_MAX_FILE_SIZE_MB',
        DEFAULT_MAX_FILE_SIZE_MB,
      ),
    );
    this.maxFileSizeBytes =
      (Number.isFinite(maxFileSizeMB) && maxFileSizeMB > 0
        ? maxFileSizeMB
        : DEFAULT_MAX_FILE_SIZE_MB) *
      1024 *
      1024;
  }

  parse(dataUri: string, targetFilename = ''): DataUriInfo {
    const parsed = parseBase64DataUri(dataUri);
    const mimeType = parsed?.mimeType ?? null;

    let filename = targetFilename;
    if (filename === '') {
      const extension =
        mimeType === null
          ? null
          : (this.typeTable.findByMimeType(mimeType)?.extensions[0] ?? null);
      filename = extension
        ? `${DATA_URI_DEFAULT_BASENAME}.${extension}`
        : DATA_URI_DEFAULT_BASENAME;
    }

    // Extension is read back from the sanitized name, not from the table
    filename = this.filenameSanitizer.sanitize(filename);

    const size = parsed ? decodedBase64Size(parsed.payload) : null;
    if (parsed && size === null) {
      this.logger.debug(
        `Payload of ${filename} is not valid base64, size left unknown`,
      );
    }

    return new DataUriInfo({
      filename,
      dataUri,
      extension: extractExtension(filename),
      mimeType,
      size,
    });
  }

  /**
   * A data URI is valid when it is base64 encoded, decodes cleanly and its
   * decoded size is within UPLOAD_MAX_FILE_SIZE_MB
   */
  isValidDataUri(dataUri: string): boolean {
    const parsed = parseBase64DataUri(dataUri);
    if (!parsed) {
      return false;
    }

    const size = decodedBase64Size(parsed.payload);
    return size !== null && size > 0 && size <= this.maxFileSizeBytes;
  }
}
