/**
 * Unit tests for the Customer 360 Orchestrator
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Customer360Orchestrator } from '../../../orchestrator/customer360-orchestrator.js';
import { InMemoryProjectStateStore } from '../../../repository/project-state-store.js';
import { ErrorCategory, StageFailureError, TargetSchema } from '../../../types/index.js';
import {
  STUB_CERTIFICATION,
  STUB_MAPPINGS,
  STUB_REQUIREMENTS,
  STUB_SCHEMA,
  STUB_SOURCES,
  createStubAgents
} from '../../fakes/stub-agents.js';

const START = new Date('2026-01-05T10:00:00.000Z');
const REQUIREMENTS_TEXT = 'Build a single customer view for retention analytics';

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>(resolve => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

describe('Customer360Orchestrator', () => {
  let store: InMemoryProjectStateStore;
  let agents: ReturnType<typeof createStubAgents>;
  let current: Date;
  let orchestrator: Customer360Orchestrator;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryProjectStateStore();
    agents = createStubAgents();
    current = START;
    orchestrator = await Customer360Orchestrator.create({
      store,
      agents,
      projectId: 'project_test',
      now: () => current
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('should persist an initialized project', async () => {
      expect(await store.load('project_test')).toEqual({
        projectId: 'project_test',
        status: 'initialized',
        currentStage: 'setup',
        requirements: {},
        errors: [],
        agentTasks: [],
        startTime: START
      });
    });

    it('should generate a project id when none is given', async () => {
      const generated = await Customer360Orchestrator.create({ store, agents });

      expect(generated.projectId).toMatch(/^project_[0-9a-f-]{36}$/);
      expect(store.size()).toBe(2);
    });
  });

  describe('processRequirements', () => {
    it('should run every stage and complete the project', async () => {
      current = new Date(START.getTime() + 12340);

      const result = await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(result.success).toBe(true);
      const state = result.state;
      expect(state.status).toBe('completed');
      expect(state.currentStage).toBe('complete');
      expect(state.requirements).toEqual({ text: REQUIREMENTS_TEXT });
      expect(state.schema).toEqual(STUB_SCHEMA);
      expect(state.dataSources).toEqual(STUB_SOURCES);
      expect(state.mappings).toEqual(STUB_MAPPINGS);
      expect(state.certification).toEqual(STUB_CERTIFICATION);
      expect(state.completionTime).toEqual(current);
      expect(state.errors).toEqual([]);
    });

    it('should validate the generated mappings against the schema', async () => {
      const result = await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(result.state.mappingValidation).toEqual({
        totalAttributes: 2,
        mappedAttributes: 1,
        coveragePercentage: 50,
        unmappedAttributes: { Customer: ['dateOfBirth'] },
        mappingIssues: [],
        validationPassed: false
      });
    });

    it('should hand each agent the previous stage outputs', async () => {
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(agents.useCase.analyzeRequirements).toHaveBeenCalledWith(REQUIREMENTS_TEXT);
      expect(agents.dataDesigner.designSchema).toHaveBeenCalledWith(REQUIREMENTS_TEXT, STUB_REQUIREMENTS);
      expect(agents.sourceSystem.identifySources).toHaveBeenCalledWith(REQUIREMENTS_TEXT, STUB_REQUIREMENTS);
      expect(agents.mapping.generateMappings).toHaveBeenCalledWith(STUB_SCHEMA, STUB_SOURCES);
      expect(agents.certification.certifyDataProduct).toHaveBeenCalledWith(
        STUB_SCHEMA,
        STUB_MAPPINGS,
        { text: REQUIREMENTS_TEXT }
      );
    });

    it('should record a task per agent call', async () => {
      const result = await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      const tasks = result.state.agentTasks;
      expect(tasks.map(task => task.agentName)).toEqual([
        'use_case',
        'data_designer',
        'source_system',
        'mapping',
        'certification'
      ]);
      expect(tasks.every(task => task.status === 'succeeded')).toBe(true);
      expect(tasks[3].output).toEqual({ mappingCount: 1 });
    });

    it('should mark the project failed when the mapping agent throws', async () => {
      agents.mapping.generateMappings.mockRejectedValueOnce(new Error('model unavailable'));

      const result = await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(StageFailureError);
        expect(result.error.stage).toBe('mapping_generation');
        expect(result.error.agentName).toBe('mapping');
        expect(result.error.message).toBe('model unavailable');
      }

      const status = await orchestrator.getProjectStatus();
      expect(status.status).toBe('failed');
      expect(status.currentStage).toBe('mapping_generation');
      expect(status.errors).toEqual(['model unavailable']);
      expect(status.schema).toEqual(STUB_SCHEMA);
      expect(status.agentTasks[3]).toMatchObject({ agentName: 'mapping', status: 'failed', error: 'model unavailable' });
      expect(agents.certification.certifyDataProduct).not.toHaveBeenCalled();
    });

    it('should run schema design and source identification concurrently', async () => {
      const design = deferred<TargetSchema>();
      agents.dataDesigner.designSchema.mockImplementationOnce(() => design.promise);

      const run = orchestrator.processRequirements(REQUIREMENTS_TEXT);

      await vi.waitFor(async () => {
        const stored = await store.load('project_test');
        expect(stored?.dataSources).toEqual(STUB_SOURCES);
      });
      const midway = await store.load('project_test');
      expect(midway?.currentStage).toBe('schema_design');
      expect(midway?.schema).toBeUndefined();
      expect(agents.mapping.generateMappings).not.toHaveBeenCalled();

      design.resolve(STUB_SCHEMA);
      const result = await run;

      expect(result.success).toBe(true);
      expect(agents.mapping.generateMappings).toHaveBeenCalledTimes(1);
    });

    it('should finish every task record when status is polled mid-run', async () => {
      const design = deferred<TargetSchema>();
      agents.dataDesigner.designSchema.mockImplementationOnce(() => design.promise);

      const run = orchestrator.processRequirements(REQUIREMENTS_TEXT);
      await vi.waitFor(() => expect(agents.sourceSystem.identifySources).toHaveBeenCalled());

      const polled = await orchestrator.getProjectStatus();
      expect(polled.status).toBe('processing');
      expect(polled.agentTasks.find(task => task.agentName === 'data_designer')?.status).toBe('running');
      await orchestrator.getTaskStatistics();

      design.resolve(STUB_SCHEMA);
      const result = await run;

      const expected = [
        ['use_case', 'succeeded'],
        ['data_designer', 'succeeded'],
        ['source_system', 'succeeded'],
        ['mapping', 'succeeded'],
        ['certification', 'succeeded']
      ];
      expect(result.state.agentTasks.map(task => [task.agentName, task.status])).toEqual(expected);
      const stored = await store.load('project_test');
      expect(stored?.agentTasks.map(task => [task.agentName, task.status])).toEqual(expected);
    });

    it('should keep the sibling result when one concurrent agent fails', async () => {
      agents.dataDesigner.designSchema.mockRejectedValueOnce(new Error('designer crashed'));

      const result = await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.stage).toBe('schema_design');
        expect(result.error.agentName).toBe('data_designer');
      }
      expect(result.state.dataSources).toEqual(STUB_SOURCES);
      expect(result.state.errors).toEqual(['designer crashed']);
    });

    it('should refuse to run a project twice', async () => {
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      await expect(orchestrator.processRequirements(REQUIREMENTS_TEXT)).rejects.toMatchObject({
        category: ErrorCategory.INVALID_STATE
      });
    });
  });

  describe('getProjectStatus', () => {
    it('should reload the state from the store', async () => {
      const stored = await store.load('project_test');
      expect(stored).not.toBeNull();
      if (stored) {
        await store.save('project_test', { ...stored, errors: ['written elsewhere'] });
      }

      expect((await orchestrator.getProjectStatus()).errors).toEqual(['written elsewhere']);
    });

    it('should return a copy', async () => {
      const first = await orchestrator.getProjectStatus();
      first.errors.push('local change');

      expect((await orchestrator.getProjectStatus()).errors).toEqual([]);
    });
  });

  describe('getTaskStatistics', () => {
    it('should be incomplete before processing', async () => {
      expect(await orchestrator.getTaskStatistics()).toEqual({ status: 'incomplete' });
    });

    it('should report elapsed seconds after completion', async () => {
      current = new Date(START.getTime() + 12340);
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(await orchestrator.getTaskStatistics()).toEqual({
        totalTime: 12.34,
        stages: {
          requirements_analysis: 'completed',
          schema_design: 'completed',
          mapping_generation: 'completed',
          certification: 'completed'
        },
        status: 'completed'
      });
    });

    it('should stay incomplete after a failed run', async () => {
      agents.useCase.analyzeRequirements.mockRejectedValueOnce(new Error('timeout'));
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(await orchestrator.getTaskStatistics()).toEqual({ status: 'incomplete' });
    });
  });

  describe('getWorkflowStages', () => {
    it('should mark every stage completed after a successful run', async () => {
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(orchestrator.getWorkflowStages().map(stage => stage.status)).toEqual([
        'completed',
        'completed',
        'completed',
        'completed',
        'completed'
      ]);
    });

    it('should show the failing stage as in progress', async () => {
      agents.mapping.generateMappings.mockRejectedValueOnce(new Error('model unavailable'));
      await orchestrator.processRequirements(REQUIREMENTS_TEXT);

      expect(orchestrator.getWorkflowStages()).toEqual([
        { name: 'Requirements Analysis', agent: 'Use Case Agent', status: 'completed' },
        { name: 'Schema Design', agent: 'Data Designer Agent', status: 'completed' },
        { name: 'Source Identification', agent: 'Source System Agent', status: 'completed' },
        { name: 'Mapping Generation', agent: 'Mapping Agent', status: 'in_progress' },
        { name: 'Certification', agent: 'Certification Agent', status: 'pending' }
      ]);
    });
  });
});
