/**
 * Orchestrator interface for the Customer 360 pipeline
 */

import {
  PipelineResult,
  ProjectState,
  TaskStatistics,
  WorkflowStage
} from '../types/index.js';

/**
 * Customer 360 Orchestrator interface
 * Drives one project through the staged pipeline and persists its state
 */
export interface ICustomer360Orchestrator {
  readonly projectId: string;

  // Pipeline
  processRequirements(requirementsText: string): Promise<PipelineResult>;

  // Status
  getProjectStatus(): Promise<ProjectState>;
  getTaskStatistics(): Promise<TaskStatistics>;
  getWorkflowStages(): WorkflowStage[];
}
