export * from './base-error.js';
export * from './validation.error.js';
export * from './not-found.error.js';
export * from './catalog-unavailable.error.js';
