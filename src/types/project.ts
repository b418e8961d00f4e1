/**
 * Project state and orchestration types
 */

import {
  ProjectStatus,
  PipelineStage,
  AgentName,
  AgentTaskStatus,
  WorkflowStageStatus,
  JsonObject,
  JsonValue
} from './common.js';
import { TargetSchema } from './schema.js';
import { Mapping, ValidationResult } from './mapping.js';
import { StageFailureError } from './error-handling.js';

/**
 * Opaque agent payloads
 */
export type StructuredRequirements = JsonObject;
export type SourceCatalog = JsonObject;

/**
 * Completeness check on structured requirements
 */
export interface RequirementsValidationResult {
  valid: boolean;
  issues: string[];
}
export type CertificationReport = JsonObject;

/**
 * Telemetry record for one agent call
 */
export interface AgentTask {
  agentName: AgentName;
  taskType: string;
  input: JsonObject;
  status: AgentTaskStatus;
  output?: JsonValue;
  error?: string;
  startTime?: Date;
  completionTime?: Date;
}

/**
 * Durable record of one pipeline run
 */
export interface ProjectState {
  projectId: string;
  status: ProjectStatus;
  currentStage: PipelineStage;
  requirements: JsonObject;
  schema?: TargetSchema;
  dataSources?: SourceCatalog;
  mappings?: Mapping[];
  mappingValidation?: ValidationResult;
  certification?: CertificationReport;
  errors: string[];
  agentTasks: AgentTask[];
  startTime: Date;
  completionTime?: Date;
}

/**
 * Outcome of a pipeline run
 */
export type PipelineResult =
  | { success: true; state: ProjectState }
  | { success: false; state: ProjectState; error: StageFailureError };

/**
 * Execution statistics for a project
 */
export type TaskStatistics =
  | { status: 'incomplete' }
  | {
      totalTime: number;
      stages: Record<Exclude<PipelineStage, 'setup' | 'complete'>, 'completed'>;
      status: ProjectStatus;
    };

/**
 * Stage entry in the workflow view
 */
export interface WorkflowStage {
  name: string;
  agent: string;
  status: WorkflowStageStatus;
}
