import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { SupportedFileTypeDto } from '../dto/supported-file-type.dto';
import { TypeTableConfigError } from '../errors/upload-intake.error';
import type { SupportedFileType, TypeTable } from '../types/type-table.interface';

/**
 * In-memory type table indexed by MIME type and by extension.
 * The first entry wins when several rows share a MIME type or an extension.
 */
export class SupportedTypeTable implements TypeTable {
  private readonly rows: readonly SupportedFileType[];
  private readonly byMimeType = new Map<string, SupportedFileType>();
  private readonly byExtension = new Map<string, SupportedFileType>();

  constructor(rows: readonly SupportedFileType[]) {
    this.rows = Object.freeze(
      rows.map((row) =>
        Object.freeze({
          ...row,
          mimeType: row.mimeType.toLowerCase(),
          extensions: Object.freeze(
            row.extensions.map((extension) => extension.toLowerCase()),
          ),
        }),
      ),
    );

    for (const row of this.rows) {
      if (!this.byMimeType.has(row.mimeType)) {
        this.byMimeType.set(row.mimeType, row);
      }
      for (const extension of row.extensions) {
        if (!this.byExtension.has(extension)) {
          this.byExtension.set(extension, row);
        }
      }
    }
  }

  findByMimeType(mimeType: string): SupportedFileType | null {
    return this.byMimeType.get(mimeType.trim().toLowerCase()) ?? null;
  }

  findByExtension(extension: string): SupportedFileType | null {
    const normalized = extension.trim().replace(/^\./, '').toLowerCase();
    return this.byExtension.get(normalized) ?? null;
  }

  entries(): readonly SupportedFileType[] {
    return this.rows;
  }
}

function flattenErrors(errors: ValidationError[], prefix: string): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}.${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

/**
 * Validate raw table rows (usually parsed JSON) and build the table.
 * Throws TypeTableConfigError when the input is not a valid table.
 */
export function loadSupportedTypeTable(raw: unknown): SupportedTypeTable {
  if (!Array.isArray(raw)) {
    throw new TypeTableConfigError('Supported type table must be an array');
  }

  const malformedRows = raw.flatMap((row: unknown, index) =>
    typeof row === 'object' && row !== null && !Array.isArray(row)
      ? []
      : [`[${index}]: row must be an object`],
  );
  if (malformedRows.length > 0) {
    throw new TypeTableConfigError(
      `Supported type table has ${malformedRows.length} malformed row(s)`,
      malformedRows,
    );
  }

  const rows = plainToInstance(SupportedFileTypeDto, raw);
  const problems = rows.flatMap((row, index) =>
    flattenErrors(
      validateSync(row, { forbidUnknownValues: true }),
      `[${index}]`,
    ),
  );

  if (problems.length > 0) {
    throw new TypeTableConfigError(
      `Supported type table has ${problems.length} invalid field(s)`,
      problems,
    );
  }

  return new SupportedTypeTable(rows);
}
