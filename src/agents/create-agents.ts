/**
 * Builds the model-backed agent set for one model client
 */

import { Customer360Agents } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { UseCaseAgent } from './use-case-agent.js';
import { DataDesignerAgent, DataDesignerAgentConfig } from './data-designer-agent.js';
import { SourceSystemAgent } from './source-system-agent.js';
import { MappingAgent } from './mapping-agent.js';
import { CertificationAgent, CertificationAgentConfig } from './certification-agent.js';

export interface AgentOptions {
  dataDesigner?: DataDesignerAgentConfig;
  certification?: Partial<CertificationAgentConfig>;
}

export function createModelAgents(model: ModelClient, options: AgentOptions = {}): Customer360Agents {
  return {
    useCase: new UseCaseAgent(model),
    dataDesigner: new DataDesignerAgent(model, options.dataDesigner),
    sourceSystem: new SourceSystemAgent(model),
    mapping: new MappingAgent(model),
    certification: new CertificationAgent(model, options.certification)
  };
}
