import { CategoryValue } from '../constants/file-type-category';
import { formatFileSize } from '../utils/file-size.utils';

export interface DataUriInfoProps {
  filename: string;
  dataUri: string;
  extension: string;
  mimeType?: string | null;
  fileTypeCategory?: CategoryValue | null;
  size?: number | null;
}

/**
 * Result of the standalone data-URI intake (see DataUriParserService)
 */
export class DataUriInfo {
  readonly filename: string;
  readonly dataUri: string;
  readonly extension: string;
  readonly mimeType: string | null;
  readonly fileTypeCategory: CategoryValue | null;
  readonly size: number | null;

  constructor(props: DataUriInfoProps) {
    this.filename = props.filename;
    this.dataUri = props.dataUri;
    this.extension = props.extension.toLowerCase();
    this.mimeType = props.mimeType ?? null;
    this.fileTypeCategory = props.fileTypeCategory ?? null;
    this.size = props.size ?? null;

    Object.freeze(this);
  }

  formattedSize(): string {
    return formatFileSize(this.size);
  }
}
