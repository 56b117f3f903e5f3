/**
 * A reference list file is missing, unreadable or has no usable header.
 */
export class ReferenceDataError extends Error {
  readonly code = 'REFERENCE_DATA_ERROR';
  readonly statusCode = 500;
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(`${message} (${filePath})`, options);
    this.name = 'ReferenceDataError';
    this.filePath = filePath;
  }
}
