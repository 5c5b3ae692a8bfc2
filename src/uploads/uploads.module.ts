import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CollisionResolverService } from './services/collision-resolver.service';
import { DataUriParserService } from './services/data-uri-parser.service';
import { FilenameSanitizerService } from './services/filename-sanitizer.service';
import { MultipartAdapterService } from './services/multipart-adapter.service';
import { TypeResolverService } from './services/type-resolver.service';
import {
  SUPPORTED_TYPE_TABLE,
  supportedTypeTableFactory,
} from './supported-type-table.provider';

@Module({
  imports: [ConfigModule],
  providers: [
    supportedTypeTableFactory,
    TypeResolverService,
    FilenameSanitizerService,
    DataUriParserService,
    MultipartAdapterService,
    CollisionResolverService,
  ],
  exports: [
    SUPPORTED_TYPE_TABLE,
    TypeResolverService,
    FilenameSanitizerService,
    DataUriParserService,
    MultipartAdapterService,
    CollisionResolverService,
  ],
})
export class UploadsModule {}
