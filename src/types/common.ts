/**
 * Common types and enums used across the Customer 360 orchestration engine
 */

// Project lifecycle
export type ProjectStatus = 'initialized' | 'processing' | 'completed' | 'failed';

export type PipelineStage =
  | 'setup'
  | 'requirements_analysis'
  | 'schema_design'
  | 'mapping_generation'
  | 'certification'
  | 'complete';

// Agent names
export type AgentName =
  | 'use_case'
  | 'data_designer'
  | 'source_system'
  | 'mapping'
  | 'certification';

// Agent task status
export type AgentTaskStatus = 'pending' | 'running' | 'succeeded' | 'failed';

// Workflow view status
export type WorkflowStageStatus = 'completed' | 'in_progress' | 'pending';

// Scalar kinds accepted in type descriptors
export type ScalarKind =
  | 'STRING'
  | 'INT'
  | 'FLOAT'
  | 'DECIMAL'
  | 'BOOLEAN'
  | 'DATE'
  | 'TIMESTAMP'
  | 'BINARY';

// State store backends
export type StateStoreBackend = 'redis' | 'memory';

/**
 * JSON value sum type for opaque agent payloads
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}
