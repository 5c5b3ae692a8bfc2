import {
  IsArray,
  ArrayMinSize,
  IsIn,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { FileTypeCategory } from '../constants/file-type-category';

const TABLE_CATEGORIES = Object.values(FileTypeCategory).filter(
  (category) => category !== FileTypeCategory.UNKNOWN,
);

/**
 * One row of the supported file type table
 */
export class SupportedFileTypeDto {
  @IsString()
  @Matches(/^[a-z0-9][a-z0-9!#$&^_.+-]*\/[a-z0-9][a-z0-9!#$&^_.+-]*$/, {
    message: 'mimeType must be a lowercase type/subtype pair',
  })
  mimeType!: string;

  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  @Matches(/^[a-z0-9]+$/, {
    each: true,
    message: 'extensions must be lowercase alphanumeric without a dot',
  })
  extensions!: string[];

  @IsIn(TABLE_CATEGORIES, {
    message: `category must be one of: ${TABLE_CATEGORIES.join(', ')}`,
  })
  category!: FileTypeCategory;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  label!: string;
}
