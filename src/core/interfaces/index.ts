export * from './intent.types.js';
export * from './entity.types.js';
export * from './confidence.types.js';
export * from './template.types.js';
export * from './selection.types.js';
export * from './generation.types.js';
export * from './validation.types.js';
