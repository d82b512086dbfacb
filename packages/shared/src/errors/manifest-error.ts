export enum ManifestErrorCode {
  /** Release descriptor missing or unreadable */
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  NO_PACKAGE_MANAGER_FOUND = 'NO_PACKAGE_MANAGER_FOUND',
  /** Manager is recognised but has no enumeration support */
  NOT_YET_SUPPORTED = 'NOT_YET_SUPPORTED',
  /** Listing command failed; the execution error is the `cause` */
  PACKAGE_QUERY_FAILED = 'PACKAGE_QUERY_FAILED',
  /** Detected manager has no adapter */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class ManifestError extends Error {
  readonly code: ManifestErrorCode;

  constructor(code: ManifestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestError';
    this.code = code;
  }
}
