export * from './schema-service.js';
export * from './mapping-validation-service.js';
export * from './mapping-analysis-service.js';
export * from './requirements-service.js';
export * from './error-handling-service.js';
