/**
 * Upload transport error codes
 * These mirror the conventional multipart upload error codes. Records keep
 * the raw integer; this table only gives them names and messages.
 */
export enum UploadErrorCode {
  OK = 0,
  INI_SIZE = 1,
  FORM_SIZE = 2,
  PARTIAL = 3,
  NO_FILE = 4,
  NO_TMP_DIR = 6,
  CANT_WRITE = 7,
  EXTENSION = 8,
}

const UPLOAD_ERROR_MESSAGES: Record<UploadErrorCode, string> = {
  [UploadErrorCode.OK]: 'No error',
  [UploadErrorCode.INI_SIZE]: 'File exceeds upload_max_filesize directive',
  [UploadErrorCode.FORM_SIZE]: 'File exceeds MAX_FILE_SIZE directive',
  [UploadErrorCode.PARTIAL]: 'File was only partially uploaded',
  [UploadErrorCode.NO_FILE]: 'No file was uploaded',
  [UploadErrorCode.NO_TMP_DIR]: 'Missing temporary folder',
  [UploadErrorCode.CANT_WRITE]: 'Failed to write file to disk',
  [UploadErrorCode.EXTENSION]: 'File upload stopped by extension',
};

const KNOWN_CODES = new Map<number, UploadErrorCode>(
  Object.values(UploadErrorCode)
    .filter((value): value is UploadErrorCode => typeof value === 'number')
    .map((code): [number, UploadErrorCode] => [code, code]),
);

export function uploadErrorFromCode(code: number): UploadErrorCode | null {
  return KNOWN_CODES.get(code) ?? null;
}

export function describeUploadError(code: number): string {
  const known = uploadErrorFromCode(code);
  return known === null
    ? `Unknown upload error (code ${code})`
    : UPLOAD_ERROR_MESSAGES[known];
}
