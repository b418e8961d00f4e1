/**
 * Main types export for the Customer 360 orchestration engine
 */

// Common types and enums
export * from './common.js';

// Target schema types
export * from './schema.js';

// Mapping and validation types
export * from './mapping.js';

// Project state types
export * from './project.js';

// Error handling types
export * from './error-handling.js';
