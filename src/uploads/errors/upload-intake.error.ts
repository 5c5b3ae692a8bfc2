/**
 * Upload intake errors
 * Malformed uploads are never reported through exceptions: they degrade to
 * null fields, UNKNOWN categories or error codes on the record. These errors
 * cover programmer and configuration mistakes only.
 */
export abstract class UploadIntakeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidUploadInputError extends UploadIntakeError {
  constructor(message: string) {
    super(message, 'UPLOAD_INVALID_INPUT');
  }
}

export class TypeTableConfigError extends UploadIntakeError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message, 'UPLOAD_TYPE_TABLE_INVALID');
  }
}
