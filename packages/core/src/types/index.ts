export * from './field.js';
export * from './source.js';
