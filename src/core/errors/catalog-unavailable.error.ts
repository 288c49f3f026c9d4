import { BaseError } from './base-error.js';

/** Raised when the template catalog cannot be read. Aborts the pipeline. */
export class CatalogUnavailableError extends BaseError {
  constructor(message = 'Template catalog unavailable', details?: unknown) {
    super('CATALOG_UNAVAILABLE', 503, message, details);
  }
}
