import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import defaultSupportedTypes from './data/supported-file-types.json';
import { TypeTableConfigError } from './errors/upload-intake.error';
import { loadSupportedTypeTable } from './services/supported-type-table';
import type { TypeTable } from './types/type-table.interface';

export const SUPPORTED_TYPE_TABLE = 'SUPPORTED_TYPE_TABLE';

export const supportedTypeTableFactory = {
  provide: SUPPORTED_TYPE_TABLE,
  useFactory: (configService: ConfigService): TypeTable => {
    const logger = new Logger('SupportedTypeTableFactory');

    // Optional override of the bundled table
    const tableFile = configService.get<string>('SUPPORTED_TYPES_FILE');

    if (!tableFile) {
      const table = loadSupportedTypeTable(defaultSupportedTypes);
      logger.log(`Loaded ${table.entries().length} bundled file types`);
      return table;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(resolve(tableFile), 'utf8'));
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      logger.error(
        `Failed to read supported type table ${tableFile}: ${errorMessage}`,
      );
      throw new TypeTableConfigError(
        `Cannot read supported type table at ${tableFile}: ${errorMessage}`,
      );
    }

    const table = loadSupportedTypeTable(raw);
    logger.log(`Loaded ${table.entries().length} file types from ${tableFile}`);
    return table;
  },
  inject: [ConfigService],
};
