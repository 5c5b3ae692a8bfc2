import defaultSupportedTypes from '../data/supported-file-types.json';
import { FileTypeCategory } from '../constants/file-type-category';
import { TypeTableConfigError } from '../errors/upload-intake.error';
import {
  SupportedTypeTable,
  loadSupportedTypeTable,
} from './supported-type-table';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('SupportedTypeTable', () => {
  const table = loadSupportedTypeTable(defaultSupportedTypes);

  it('loads the bundled table', () => {
    expect(table.entries()).toHaveLength(53);
  });

  it('finds rows by MIME type case-insensitively', () => {
    expect(table.findByMimeType('IMAGE/PNG')).toEqual({
      mimeType: 'image/png',
      extensions: ['png'],
      category: FileTypeCategory.IMAGE,
      label: 'PNG image',
    });
    expect(table.findByMimeType('application/x-unknown')).toBeNull();
  });

  it('finds rows by any listed extension', () => {
    expect(table.findByExtension('.JPE')?.mimeType).toBe('image/jpeg');
    expect(table.findByExtension('tif')?.mimeType).toBe('image/tiff');
    expect(table.findByExtension('exe')).toBeNull();
  });

  it('keeps the first row when extensions repeat', () => {
    expect(table.findByExtension('pdf')?.mimeType).toBe('application/pdf');
  });

  it('normalizes rows given directly', () => {
    const custom = new SupportedTypeTable([
      {
        mimeType: 'Image/X-Custom',
        extensions: ['XCU'],
        category: FileTypeCategory.IMAGE,
        label: 'Custom image',
      },
    ]);

    expect(custom.findByExtension('xcu')?.mimeType).toBe('image/x-custom');
    expect(Object.isFrozen(custom.entries())).toBe(true);
  });

  describe('loadSupportedTypeTable', () => {
    it('rejects input that is not an array', () => {
      expect(() => loadSupportedTypeTable({ rows: [] })).toThrow(
        new TypeTableConfigError('Supported type table must be an array'),
      );
    });

    it('rejects rows that are not objects', () => {
      const error = captureError(() =>
        loadSupportedTypeTable([
          null,
          'image/png',
          {
            mimeType: 'image/png',
            extensions: ['png'],
            category: 'image',
            label: 'PNG image',
          },
          ['png'],
        ]),
      );

      if (!(error instanceof TypeTableConfigError)) {
        throw error;
      }
      expect(error.message).toBe('Supported type table has 3 malformed row(s)');
      expect(error.details).toEqual([
        '[0]: row must be an object',
        '[1]: row must be an object',
        '[3]: row must be an object',
      ]);
    });

    it('reports every invalid field', () => {
      const error = captureError(() =>
        loadSupportedTypeTable([
          {
            mimeType: 'image/png',
            extensions: ['png'],
            category: 'image',
            label: 'PNG image',
          },
          {
            mimeType: 'Image/PNG',
            extensions: ['.png'],
            category: 'unknown',
            label: '',
          },
        ]),
      );

      if (!(error instanceof TypeTableConfigError)) {
        throw error;
      }
      expect(error.code).toBe('UPLOAD_TYPE_TABLE_INVALID');
      expect(error.message).toBe('Supported type table has 4 invalid field(s)');
      expect(error.details).toContain(
        '[1].mimeType: mimeType must be a lowercase type/subtype pair',
      );
      expect(error.details).toContain(
        '[1].extensions: extensions must be lowercase alphanumeric without a dot',
      );
      expect(error.details).toContain(
        '[1].category: category must be one of: image, document, video, audio, archive',
      );
      expect(error.details).toContain('[1].label: label should not be empty');
    });
  });
});
