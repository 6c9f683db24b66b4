/**
 * Defines custom error types for the docs-librarian application.
 */

/**
 * Base class for all librarian specific errors.
 * Carries a machine readable errorCode and optional details.
 */
export class LibrarianError extends Error {
  public errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Reduction Errors ---

/**
 * None of the structural selectors matched a page. Never thrown by the
 * reducers; it travels inside the `selector-miss` observer event.
 */
export class ContentNotFoundError extends LibrarianError {
  constructor(url: string, selectors: readonly string[], details?: Record<string, unknown>) {
    super(
      `No content root found for ${url}. Tried selectors: ${selectors.join(', ')}`,
      'CONTENT_NOT_FOUND',
      { url, selectors: [...selectors], ...details }
    );
  }
}

export class MalformedMetadataError extends LibrarianError {
  constructor(field: string, reason: string, details?: Record<string, unknown>) {
    super(`Malformed metadata: '${field}' ${reason}`, 'MALFORMED_METADATA', { field, reason, ...details });
  }
}

// --- Index Service Errors ---

export class IndexWriteError extends LibrarianError {
  constructor(rootUrl: string, recordCount: number, originalError?: Error, details?: Record<string, unknown>) {
    super(
      `Failed to save ${recordCount} records for ${rootUrl}. ${originalError?.message || ''}`.trim(),
      'INDEX_WRITE_FAILED',
      { rootUrl, recordCount, originalError, ...details }
    );
  }
}

export class IndexBrowseError extends LibrarianError {
  constructor(filter: string, originalError?: Error, details?: Record<string, unknown>) {
    super(`Failed to browse records matching ${filter}. ${originalError?.message || ''}`.trim(), 'INDEX_BROWSE_FAILED', {
      filter,
      originalError,
      ...details
    });
  }
}

export class IndexDeleteError extends LibrarianError {
  constructor(rootUrl: string, idCount: number, originalError?: Error, details?: Record<string, unknown>) {
    super(
      `Failed to delete ${idCount} records for ${rootUrl}. ${originalError?.message || ''}`.trim(),
      'INDEX_DELETE_FAILED',
      { rootUrl, idCount, originalError, ...details }
    );
  }
}

/**
 * A call to the index backend failed. Adapters wrap client errors in it.
 */
export class IndexServiceError extends LibrarianError {
  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super(message, 'INDEX_SERVICE_ERROR', { originalError, ...details });
  }
}

export class SyncInProgressError extends LibrarianError {
  constructor(rootUrl: string) {
    super(`A synchronization run for ${rootUrl} is already in progress`, 'SYNC_IN_PROGRESS', { rootUrl });
  }
}

// --- Download Errors ---

export class DownloadError extends LibrarianError {
  constructor(url: string, statusCode?: number, originalError?: Error, details?: Record<string, unknown>) {
    super(
      `Failed to download ${url}${statusCode !== undefined ? ` (HTTP ${statusCode})` : ''}. ${originalError?.message || ''}`.trim(),
      'DOWNLOAD_FAILED',
      { url, statusCode, originalError, ...details }
    );
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends LibrarianError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isLibrarianError(error: unknown): error is LibrarianError {
  return error instanceof LibrarianError;
}
