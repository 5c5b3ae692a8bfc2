/**
 * Multipart upload descriptor as handed over by the transport layer.
 * Mirrors the conventional form-upload array: `tmp_name` or `path` locate the
 * temporary file, `error` carries the transport error code, `type` is the
 * client-reported MIME type (untrusted).
 */
export interface MultipartDescriptor {
  name: string;
  tmp_name?: string | null;
  path?: string | null;
  size?: number | null;
  error?: number | null;
  type?: string | null;
}

/**
 * Multi-file form upload: the same fields as MultipartDescriptor, each an
 * array indexed by file
 */
export interface MultipartFileList {
  name: readonly string[];
  tmp_name?: readonly (string | null | undefined)[] | null;
  path?: readonly (string | null | undefined)[] | null;
  size?: readonly (number | null | undefined)[] | null;
  error?: readonly (number | null | undefined)[] | null;
  type?: readonly (string | null | undefined)[] | null;
}

/**
 * Minimal shape of a Multer file (disk storage) from NestJS FileInterceptor
 */
export type MulterFile = {
  originalname: string;
  mimetype: string;
  size: number;
  path: string;
  filename?: string;
  destination?: string;
};
