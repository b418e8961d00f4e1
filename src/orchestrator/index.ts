export * from './customer360-orchestrator.js';
