export * from './project-state-codec.js';
export * from './project-state-store.js';
export * from './state-store-config.js';
