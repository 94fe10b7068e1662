export * from './schema.js';
export * from './settings.js';
