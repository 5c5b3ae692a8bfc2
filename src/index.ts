import 'reflect-metadata';

export * from './uploads/constants/file-type-category';
export * from './uploads/constants/upload-error-codes';
export * from './uploads/errors/upload-intake.error';
export * from './uploads/models/file-record.model';
export * from './uploads/models/data-uri-info.model';
export * from './uploads/services/collision-resolver.service';
export * from './uploads/services/data-uri-parser.service';
export * from './uploads/services/filename-sanitizer.service';
export * from './uploads/services/multipart-adapter.service';
export * from './uploads/services/supported-type-table';
export * from './uploads/services/type-resolver.service';
export * from './uploads/supported-type-table.provider';
export * from './uploads/types/type-resolver.interface';
export * from './uploads/types/type-table.interface';
export * from './uploads/types/upload-input.types';
export * from './uploads/utils/data-uri.utils';
export * from './uploads/utils/file-size.utils';
export * from './uploads/utils/filename.utils';
export * from './uploads/utils/multipart.utils';
export * from './uploads/uploads.module';
