import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { FileTypeCategory } from './constants/file-type-category';
import { CollisionResolverService } from './services/collision-resolver.service';
import { DataUriParserService } from './services/data-uri-parser.service';
import { MultipartAdapterService } from './services/multipart-adapter.service';
import { TypeResolverService } from './services/type-resolver.service';
import { FileRecord } from './models/file-record.model';
import { UploadsModule } from './uploads.module';

describe('UploadsModule', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ FILENAME_MAX_LENGTH: 40 })],
        }),
        UploadsModule,
      ],
    }).compile();
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('parses data URIs with the bundled table', () => {
    const info = moduleRef
      .get(DataUriParserService)
      .parse('data:application/pdf;base64,JVBERi0=');

    expect(info.filename).toBe('data_uri_file.pdf');
    expect(info.size).toBe(5);
  });

  it('builds records from both sources', () => {
    const adapter = moduleRef.get(MultipartAdapterService);
    const typeResolver = moduleRef.get(TypeResolverService);
    const collisions = moduleRef.get(CollisionResolverService);

    const fromForm = adapter.adapt({
      name: 'holiday.jpg',
      tmp_name: '/tmp/upload-1',
      size: 1024,
      error: 0,
    });
    const fromDataUri = FileRecord.fromDataUri(
      'data:image/jpeg;base64,/9j/4A==',
      'holiday',
      typeResolver,
    );
    const renamed = collisions.resolveRecord(
      fromDataUri.withFilename('holiday.jpg'),
      { usedFilenames: [fromForm.filename] },
    );

    expect(fromForm.resolvedCategory()).toBe(FileTypeCategory.IMAGE);
    expect(fromDataUri.extension).toBe('jpg');
    expect(fromDataUri.categoryLabel()).toBe('Images');
    expect(renamed.filename).toBe('holiday_1.jpg');
  });

  it('applies configured filename limits', () => {
    const record = moduleRef
      .get(MultipartAdapterService)
      .adapt({ name: `${'x'.repeat(60)}.txt`, error: 0 });

    expect(record.filename).toBe(`${'x'.repeat(36)}.txt`);
  });
});
