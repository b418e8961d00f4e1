export * from './json-extraction.js';
export * from './logger.js';
