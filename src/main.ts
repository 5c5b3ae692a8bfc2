import 'reflect-metadata';
import { statSync } from 'fs';
import { basename } from 'path';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { DataUriParserService } from './uploads/services/data-uri-parser.service';
import { MultipartAdapterService } from './uploads/services/multipart-adapter.service';
import { UploadErrorCode } from './uploads/constants/upload-error-codes';

/**
 * Inspect one upload from the command line:
 *   node dist/main.js "data:image/png;base64,..." [target-name]
 *   node dist/main.js ./photo.heic [target-name]
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  const [input, targetFilename = ''] = process.argv.slice(2);

  if (!input) {
    logger.warn('Usage: main <data-uri | file path> [target filename]');
  } else if (input.startsWith('data:')) {
    const info = app.get(DataUriParserService).parse(input, targetFilename);
    logger.log(
      `${info.filename}: ${info.mimeType ?? 'unknown MIME type'}, ${info.formattedSize()}`,
    );
  } else {
    const stats = statSync(input, { throwIfNoEntry: false });
    const record = app.get(MultipartAdapterService).adapt(
      {
        name: basename(input),
        path: input,
        size: stats?.size ?? null,
        error: stats ? UploadErrorCode.OK : UploadErrorCode.NO_FILE,
      },
      targetFilename,
    );
    logger.log(
      `${record.filename}: ${record.categoryLabel()}` +
        (record.needsFormatConversion() ? ' (needs format conversion)' : ''),
    );
  }

  await app.close();
}

void bootstrap();
