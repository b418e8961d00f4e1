/**
 * Unit tests for the Project State Store backends
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  IProjectStateStore,
  InMemoryProjectStateStore,
  RedisProjectStateStore,
  projectKey
} from '../../../repository/project-state-store.js';
import { StateCorruptionError, ProjectState } from '../../../types/index.js';
import { FakeKeyValueClient } from '../../fakes/fake-key-value-client.js';

function completedState(projectId: string): ProjectState {
  return {
    projectId,
    status: 'completed',
    currentStage: 'complete',
    requirements: { text: 'Build a single customer view' },
    schema: { Customer: { customerId: 'STRING', name: 'STRUCT<first:STRING, last:STRING>' } },
    dataSources: { 'Core Banking System': { tables: ['CUSTOMER_MASTER'] } },
    mappings: [
      {
        sourceSystem: 'Core Banking System',
        sourceTable: 'CUSTOMER_MASTER',
        sourceAttribute: 'CUST_ID',
        targetEntity: 'Customer',
        targetAttribute: 'customerId',
        transformationLogic: 'CAST(CUST_ID AS STRING)',
        metadata: { generatedBy: 'MappingAgent', version: '1.0', model: 'test-model' }
      }
    ],
    mappingValidation: {
      totalAttributes: 4,
      mappedAttributes: 1,
      coveragePercentage: 25,
      unmappedAttributes: { Customer: ['name', 'name.first', 'name.last'] },
      mappingIssues: [],
      validationPassed: false
    },
    certification: { complianceStatus: 'Approved', dataQualityScore: 91.5 },
    errors: [],
    agentTasks: [
      {
        agentName: 'use_case',
        taskType: 'analyze_requirements',
        input: { requirementsText: 'Build a single customer view' },
        status: 'succeeded',
        output: { businessObjective: 'Single view' },
        startTime: new Date('2026-01-05T10:00:00.000Z'),
        completionTime: new Date('2026-01-05T10:00:02.500Z')
      }
    ],
    startTime: new Date('2026-01-05T10:00:00.000Z'),
    completionTime: new Date('2026-01-05T10:00:09.250Z')
  };
}

const backends: Array<[string, () => IProjectStateStore]> = [
  ['InMemoryProjectStateStore', () => new InMemoryProjectStateStore()],
  ['RedisProjectStateStore', () => new RedisProjectStateStore(new FakeKeyValueClient())]
];

describe.each(backends)('%s', (_name, createStore) => {
  let store: IProjectStateStore;

  beforeEach(() => {
    store = createStore();
  });

  it('should round-trip a full project state', async () => {
    const state = completedState('project_a');

    await store.save('project_a', state);
    const loaded = await store.load('project_a');

    expect(loaded).toEqual(state);
    expect(loaded?.startTime).toBeInstanceOf(Date);
  });

  it('should return null for an unknown project', async () => {
    expect(await store.load('missing')).toBeNull();
  });

  it('should overwrite the whole record on save', async () => {
    await store.save('project_a', completedState('project_a'));
    const failed: ProjectState = {
      projectId: 'project_a',
      status: 'failed',
      currentStage: 'mapping_generation',
      requirements: { text: 'x' },
      errors: ['model unavailable'],
      agentTasks: [],
      startTime: new Date('2026-01-05T11:00:00.000Z')
    };

    await store.save('project_a', failed);

    expect(await store.load('project_a')).toEqual(failed);
  });

  it('should keep projects isolated', async () => {
    await store.save('project_a', completedState('project_a'));
    await store.save('project_b', completedState('project_b'));

    expect((await store.load('project_a'))?.projectId).toBe('project_a');
    expect((await store.load('project_b'))?.projectId).toBe('project_b');
  });

  it('should return copies, not the saved object', async () => {
    const state = completedState('project_a');
    await store.save('project_a', state);

    state.errors.push('changed after save');

    expect((await store.load('project_a'))?.errors).toEqual([]);
  });
});

describe('RedisProjectStateStore', () => {
  it('should store records under project:<id>', async () => {
    const client = new FakeKeyValueClient();
    const store = new RedisProjectStateStore(client);

    await store.save('project_a', completedState('project_a'));

    expect(projectKey('project_a')).toBe('project:project_a');
    expect([...client.data.keys()]).toEqual(['project:project_a']);
  });

  it('should raise StateCorruptionError for a record of the wrong shape', async () => {
    const client = new FakeKeyValueClient();
    client.data.set('project:broken', '{"projectId": 1}');
    const store = new RedisProjectStateStore(client);

    await expect(store.load('broken')).rejects.toThrow(
      "Stored record project:broken could not be decoded: Invalid project state at 'projectId': expected string"
    );
  });

  it('should keep an entity whose name is an object prototype key', async () => {
    const client = new FakeKeyValueClient();
    client.data.set(
      'project:odd',
      '{"projectId":"odd","status":"completed","currentStage":"complete","requirements":{},"errors":[],' +
        '"agentTasks":[],"startTime":"2026-01-05T10:00:00.000Z",' +
        '"schema":{"__proto__":{"id":"STRING"},"Customer":{"customerId":"STRING"}}}'
    );

    const schema = (await new RedisProjectStateStore(client).load('odd'))?.schema ?? {};

    expect(Object.keys(schema)).toEqual(['__proto__', 'Customer']);
    expect(Object.getPrototypeOf(schema)).toBe(Object.prototype);
  });

  it('should raise StateCorruptionError for text that is not JSON', async () => {
    const client = new FakeKeyValueClient();
    client.data.set('project:garbled', 'not-json');

    await expect(new RedisProjectStateStore(client).load('garbled')).rejects.toBeInstanceOf(StateCorruptionError);
  });

  it('should quit the client on close', async () => {
    const client = new FakeKeyValueClient();

    await new RedisProjectStateStore(client).close();

    expect(client.closed).toBe(true);
  });
});
