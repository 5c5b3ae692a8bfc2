import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_FILENAME_MAX_LENGTH,
  SanitizeFilenameOptions,
  sanitizeFilename,
} from '../utils/filename.utils';

export type FilenameSanitizerOptions = Omit<
  SanitizeFilenameOptions,
  'maxLength'
>;

@Injectable()
export class FilenameSanitizerService {
  private readonly logger = new Logger(FilenameSanitizerService.name);
  private readonly maxLength: number;

  constructor(private readonly configService: ConfigService) {
    const configured = Number(
      this.configService.get<number>(
        'FILENAME_MAX_LENGTH',
        DEFAULT_FILENAME_MAX_LENGTH,
      ),
    );
    this.maxLength =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_FILENAME_MAX_LENGTH;
  }

  /**
   * Strip path separators, unsafe and control characters from a filename
   * @param filename - Candidate filename, usually client supplied
   * @param options - Optional removal of underscores, spaces or custom characters
   */
  sanitize(filename: string, options: FilenameSanitizerOptions = {}): string {
    const sanitized = sanitizeFilename(filename, {
      ...options,
      maxLength: this.maxLength,
    });

    if (sanitized !== filename) {
      this.logger.debug(`Sanitized filename "${filename}" to "${sanitized}"`);
    }

    return sanitized;
  }
}
