/**
 * Entry point wiring: selects the state store once and hands it to every
 * orchestrator created for this process
 */

import { MappingValidationOptions, StoreUnavailableError } from './types/index.js';
import { Customer360Agents } from './interfaces/agents.js';
import { ModelClient } from './interfaces/services.js';
import { AgentOptions, createModelAgents } from './agents/create-agents.js';
import { Customer360Orchestrator } from './orchestrator/customer360-orchestrator.js';
import { IProjectStateStore } from './repository/project-state-store.js';
import {
  KeyValueConnector,
  StateStoreOverrides,
  connectRedis,
  initializeStateStore
} from './repository/state-store-config.js';

type AgentSource =
  | { agents: Customer360Agents }
  | { model: ModelClient; agentOptions?: AgentOptions };

export type Customer360SystemOptions = AgentSource & {
  stateStore?: StateStoreOverrides;
  connect?: KeyValueConnector;
  mappingValidation?: Partial<MappingValidationOptions>;
};

export interface Customer360System {
  readonly store: IProjectStateStore;
  /** True when Redis was preferred but unreachable */
  readonly usingFallback: boolean;
  readonly storeDiagnostic?: StoreUnavailableError;
  createProject(projectId?: string): Promise<Customer360Orchestrator>;
  close(): Promise<void>;
}

export async function createCustomer360System(options: Customer360SystemOptions): Promise<Customer360System> {
  const agents = 'agents' in options ? options.agents : createModelAgents(options.model, options.agentOptions);
  const selection = await initializeStateStore(options.stateStore, options.connect ?? connectRedis);
  const { store } = selection;

  return {
    store,
    usingFallback: selection.usingFallback,
    storeDiagnostic: selection.diagnostic,
    createProject: (projectId) =>
      Customer360Orchestrator.create({
        store,
        agents,
        projectId,
        mappingValidation: options.mappingValidation
      }),
    close: () => store.close()
  };
}
