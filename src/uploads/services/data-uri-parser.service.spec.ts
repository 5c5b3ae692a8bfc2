import { ConfigService } from '@nestjs/config';
import defaultSupportedTypes from '../data/supported-file-types.json';
import { DataUriParserService } from './data-uri-parser.service';
import { FilenameSanitizerService } from './filename-sanitizer.service';
import { loadSupportedTypeTable } from './supported-type-table';

const PNG_DATA_URI = 'data:image/png;base64,iVBORw0KGgo=';

function createParser(config: Record<string, unknown> = {}) {
  const configService = new ConfigService(config);
  return new DataUriParserService(
    loadSupportedTypeTable(defaultSupportedTypes),
    new FilenameSanitizerService(configService),
    configService,
  );
}

describe('DataUriParserService', () => {
  const parser = createParser();

  describe('parse', () => {
    it('synthesizes a filename from the MIME type', () => {
      const info = parser.parse(PNG_DATA_URI);

      expect(info.filename).toBe('data_uri_file.png');
      expect(info.extension).toBe('png');
      expect(info.mimeType).toBe('image/png');
      expect(info.size).toBe(8);
      expect(info.formattedSize()).toBe('8 B');
      expect(info.dataUri).toBe(PNG_DATA_URI);
      expect(info.fileTypeCategory).toBeNull();
    });

    it('keeps a supplied filename and reads its extension', () => {
      const info = parser.parse(PNG_DATA_URI, 'Holiday Photo.PNG');

      expect(info.filename).toBe('Holiday Photo.PNG');
      expect(info.extension).toBe('png');
    });

    it('sanitizes a supplied filename', () => {
      const info = parser.parse(PNG_DATA_URI, '../secret/report.pdf');

      expect(info.filename).toBe('secretreport.pdf');
      expect(info.extension).toBe('pdf');
    });

    it('omits the extension for unmapped MIME types', () => {
      const info = parser.parse('data:application/x-custom;base64,aGVsbG8=');

      expect(info.filename).toBe('data_uri_file');
      expect(info.extension).toBe('');
      expect(info.mimeType).toBe('application/x-custom');
      expect(info.size).toBe(5);
    });

    it('leaves MIME type and size unknown without base64 encoding', () => {
      const info = parser.parse('data:text/plain;charset=utf-8,hello');

      expect(info.mimeType).toBeNull();
      expect(info.size).toBeNull();
      expect(info.filename).toBe('data_uri_file');
      expect(info.formattedSize()).toBe('Unknown size');
    });

    it('leaves the size unknown for invalid payloads', () => {
      expect(parser.parse('data:image/png;base64,not*valid').size).toBeNull();
      expect(parser.parse('data:image/png;base64,').size).toBeNull();
    });

    it('does not throw on arbitrary strings', () => {
      const info = parser.parse('hello world');

      expect(info.mimeType).toBeNull();
      expect(info.size).toBeNull();
      expect(info.filename).toBe('data_uri_file');
    });
  });

  describe('isValidDataUri', () => {
    it('accepts a decodable base64 data URI', () => {
      expect(parser.isValidDataUri(PNG_DATA_URI)).toBe(true);
    });

    it('rejects empty, invalid and non-base64 data URIs', () => {
      expect(parser.isValidDataUri('data:image/png;base64,')).toBe(false);
      expect(parser.isValidDataUri('data:image/png;base64,%%%%')).toBe(false);
      expect(parser.isValidDataUri('data:text/plain,hello')).toBe(false);
    });

    it('rejects payloads above the configured size', () => {
      // 0.000005 MB is just over 5 bytes
      const strict = createParser({ UPLOAD_MAX_FILE_SIZE_MB: 0.000005 });

      expect(strict.isValidDataUri('data:text/plain;base64,aGVsbG8=')).toBe(
        true,
      );
      expect(strict.isValidDataUri('data:text/plain;base64,aGVsbG8hIQ==')).toBe(
        false,
      );
    });
  });
});
