/**
 * Customer 360 Orchestration & Validation Engine
 *
 * Main entry point
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export services and utilities
export * from './services/index.js';
export * from './utils/index.js';

// Export repository
export * from './repository/index.js';

// Export agents
export * from './agents/index.js';

// Export orchestrator
export * from './orchestrator/index.js';

export * from './bootstrap.js';
