/**
 * Customer 360 Orchestrator
 * Sequences the five agents over one project, persisting the project state
 * at every stage boundary
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AgentName,
  AgentTask,
  ErrorCategory,
  JsonObject,
  JsonValue,
  MappingValidationOptions,
  PipelineError,
  PipelineResult,
  PipelineStage,
  ProjectState,
  SourceCatalog,
  StageFailureError,
  TargetSchema,
  TaskStatistics,
  WorkflowStage,
  WorkflowStageStatus
} from '../types/index.js';
import { Customer360Agents } from '../interfaces/agents.js';
import { ICustomer360Orchestrator } from '../interfaces/orchestrator.js';
import { IProjectStateStore } from '../repository/project-state-store.js';
import { cloneProjectState } from '../repository/project-state-codec.js';
import { validateMappings } from '../services/mapping-validation-service.js';
import { logError } from '../services/error-handling-service.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Orchestrator');

/**
 * Options for creating an orchestrator
 */
export interface Customer360OrchestratorOptions {
  store: IProjectStateStore;
  agents: Customer360Agents;
  /** Defaults to project_<uuid> */
  projectId?: string;
  mappingValidation?: Partial<MappingValidationOptions>;
  now?: () => Date;
}

function stageStatus(completed: boolean, inProgress: boolean): WorkflowStageStatus {
  if (completed) return 'completed';
  return inProgress ? 'in_progress' : 'pending';
}

/**
 * Implementation of the Customer 360 Orchestrator
 */
export class Customer360Orchestrator implements ICustomer360Orchestrator {
  private constructor(
    private store: IProjectStateStore,
    private agents: Customer360Agents,
    private state: ProjectState,
    private validationOptions: Partial<MappingValidationOptions>,
    private now: () => Date
  ) {}

  /**
   * Creates a project in the `initialized` state and persists it
   */
  static async create(options: Customer360OrchestratorOptions): Promise<Customer360Orchestrator> {
    const now = options.now ?? (() => new Date());
    const state: ProjectState = {
      projectId: options.projectId ?? `project_${uuidv4()}`,
      status: 'initialized',
      currentStage: 'setup',
      requirements: {},
      errors: [],
      agentTasks: [],
      startTime: now()
    };

    const orchestrator = new Customer360Orchestrator(
      options.store,
      options.agents,
      state,
      options.mappingValidation ?? {},
      now
    );
    await orchestrator.persist();
    logger.info(`Created project ${state.projectId}`);
    return orchestrator;
  }

  get projectId(): string {
    return this.state.projectId;
  }

  /**
   * Runs the full pipeline once. Agent failures end the run with
   * `success: false`; store failures are thrown.
   */
  async processRequirements(requirementsText: string): Promise<PipelineResult> {
    if (this.state.status !== 'initialized') {
      throw new PipelineError(
        `Project ${this.projectId} cannot be processed from status '${this.state.status}'`,
        ErrorCategory.INVALID_STATE
      );
    }

    this.state.requirements = { text: requirementsText };
    this.state.status = 'processing';

    try {
      await this.enterStage('requirements_analysis');
      const structured = await this.runAgent('use_case', 'analyze_requirements', { requirementsText }, () =>
        this.agents.useCase.analyzeRequirements(requirementsText),
        result => result
      );

      await this.enterStage('schema_design');
      const { schema, dataSources } = await this.designAndSource(requirementsText, structured);

      await this.enterStage('mapping_generation');
      const mappings = await this.runAgent(
        'mapping',
        'generate_mappings',
        { schema, dataSources },
        () => this.agents.mapping.generateMappings(schema, dataSources),
        result => ({ mappingCount: result.length })
      );
      this.state.mappings = mappings;
      this.state.mappingValidation = validateMappings(schema, mappings, this.validationOptions);
      logger.info(`Mapping coverage ${this.state.mappingValidation.coveragePercentage}%`);

      await this.enterStage('certification');
      const requirements = this.state.requirements;
      this.state.certification = await this.runAgent(
        'certification',
        'certify_data_product',
        { requirements, mappingCount: mappings.length },
        () => this.agents.certification.certifyDataProduct(schema, mappings, requirements),
        result => result
      );

      this.state.status = 'completed';
      this.state.currentStage = 'complete';
      this.state.completionTime = this.now();
      await this.persist();
      logger.info(`Project ${this.projectId} completed`);

      return { success: true, state: cloneProjectState(this.state) };
    } catch (error) {
      if (!(error instanceof StageFailureError)) {
        throw error;
      }

      this.state.errors.push(error.message);
      this.state.status = 'failed';
      await this.persist();
      logError(error, { projectId: this.projectId, stage: error.stage, agent: error.agentName });

      return { success: false, state: cloneProjectState(this.state), error };
    }
  }

  /**
   * Current state, reloaded from the store
   */
  async getProjectStatus(): Promise<ProjectState> {
    await this.reload();
    return cloneProjectState(this.state);
  }

  async getTaskStatistics(): Promise<TaskStatistics> {
    await this.reload();
    const { startTime, completionTime, status } = this.state;
    if (!completionTime) {
      return { status: 'incomplete' };
    }

    const elapsedMs = completionTime.getTime() - startTime.getTime();
    return {
      totalTime: Math.round(elapsedMs / 10) / 100,
      stages: {
        requirements_analysis: 'completed',
        schema_design: 'completed',
        mapping_generation: 'completed',
        certification: 'completed'
      },
      status
    };
  }

  /**
   * Stage view derived from the current stage
   */
  getWorkflowStages(): WorkflowStage[] {
    const stage = this.state.currentStage;
    const before = (...stages: PipelineStage[]) => !stages.includes(stage);

    const designStatus = stageStatus(before('requirements_analysis', 'schema_design'), stage === 'schema_design');

    return [
      {
        name: 'Requirements Analysis',
        agent: 'Use Case Agent',
        status: stage !== 'requirements_analysis' ? 'completed' : 'in_progress'
      },
      { name: 'Schema Design', agent: 'Data Designer Agent', status: designStatus },
      { name: 'Source Identification', agent: 'Source System Agent', status: designStatus },
      {
        name: 'Mapping Generation',
        agent: 'Mapping Agent',
        status: stageStatus(
          before('requirements_analysis', 'schema_design', 'mapping_generation'),
          stage === 'mapping_generation'
        )
      },
      {
        name: 'Certification',
        agent: 'Certification Agent',
        status: stageStatus(stage === 'complete', stage === 'certification')
      }
    ];
  }

  // ==================== Private Helpers ====================

  /**
   * Data Designer and Source System run concurrently; each result is
   * persisted as it arrives and both must succeed
   */
  private async designAndSource(
    requirementsText: string,
    structured: JsonObject
  ): Promise<{ schema: TargetSchema; dataSources: SourceCatalog }> {
    const input = { requirementsText, requirements: structured };

    const [designed, sourced] = await Promise.allSettled([
      this.runAgent('data_designer', 'design_schema', input, () =>
        this.agents.dataDesigner.designSchema(requirementsText, structured),
        result => result
      ).then(async schema => {
        this.state.schema = schema;
        await this.persist();
        return schema;
      }),
      this.runAgent('source_system', 'identify_sources', input, () =>
        this.agents.sourceSystem.identifySources(requirementsText, structured),
        result => result
      ).then(async dataSources => {
        this.state.dataSources = dataSources;
        await this.persist();
        return dataSources;
      })
    ]);

    if (designed.status === 'rejected') throw designed.reason;
    if (sourced.status === 'rejected') throw sourced.reason;
    return { schema: designed.value, dataSources: sourced.value };
  }

  /**
   * Runs one agent call under an AgentTask record. Failures are rethrown as
   * StageFailureError for the stage the call started in.
   */
  private async runAgent<T>(
    agentName: AgentName,
    taskType: string,
    input: JsonObject,
    call: () => Promise<T>,
    summarize: (result: T) => JsonValue
  ): Promise<T> {
    const stage = this.state.currentStage;
    const task: AgentTask = { agentName, taskType, input, status: 'running', startTime: this.now() };
    this.state.agentTasks.push(task);
    logger.debug(`Running ${agentName} (${taskType})`);

    try {
      const result = await call();
      task.status = 'succeeded';
      task.output = summarize(result);
      task.completionTime = this.now();
      return result;
    } catch (error) {
      const failure = new StageFailureError(stage, agentName, error);
      task.status = 'failed';
      task.error = failure.message;
      task.completionTime = this.now();
      throw failure;
    }
  }

  private async enterStage(stage: PipelineStage): Promise<void> {
    this.state.currentStage = stage;
    await this.persist();
    logger.info(`Project ${this.projectId} entered ${stage}`);
  }

  private async persist(): Promise<void> {
    await this.store.save(this.state.projectId, this.state);
  }

  private async reload(): Promise<void> {
    // During a run this instance holds the newest state, including open task records
    if (this.state.status === 'processing') {
      return;
    }
    const stored = await this.store.load(this.state.projectId);
    if (stored) {
      this.state = stored;
    }
  }
}
