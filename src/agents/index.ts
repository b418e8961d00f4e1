export * from './model-response.js';
export * from './use-case-agent.js';
export * from './data-designer-agent.js';
export * from './source-system-agent.js';
export * from './mapping-agent.js';
export * from './certification-agent.js';
export * from './create-agents.js';
