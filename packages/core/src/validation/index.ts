export * from './schema_validator.js';
