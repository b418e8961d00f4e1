/**
 * Source System Agent
 * Catalogs the banking systems that can feed the Customer 360 product
 */

import { SourceCatalog, StructuredRequirements } from '../types/index.js';
import { ISourceSystemAgent } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { extractObject } from '../utils/json-extraction.js';
import { createLogger } from '../utils/logger.js';
import { AGENT_VERSION, PARSE_FAILURE_MESSAGE, requestStructured, toPrettyJson } from './model-response.js';

const SYSTEM_PROMPT = `You are a banking data sourcing specialist. Identify source systems
for customer data and describe them as a JSON object keyed by system name.`;

const logger = createLogger('SourceSystemAgent');

function fallbackCatalog(rawResponse: string): SourceCatalog {
  return {
    error: PARSE_FAILURE_MESSAGE,
    rawResponse,
    'Core Banking System': {
      tables: ['CUSTOMER_MASTER', 'ACCOUNT_MASTER'],
      update_frequency: 'Daily',
      data_quality: 'High'
    },
    'CRM System': {
      tables: ['CUSTOMER_INTERACTIONS'],
      update_frequency: 'Real-time',
      data_quality: 'Medium'
    }
  };
}

/**
 * Implementation of the Source System Agent
 */
export class SourceSystemAgent implements ISourceSystemAgent {
  constructor(private model: ModelClient) {}

  async identifySources(requirementsText: string, requirements: StructuredRequirements): Promise<SourceCatalog> {
    const prompt = `Identify the banking data sources for this Customer 360 use case:

${requirementsText}

${toPrettyJson(requirements)}

For each source system give its key tables, update frequency, data quality and
the customer attributes it provides.`;

    const result = await requestStructured(this.model, SYSTEM_PROMPT, prompt, extractObject, logger);
    const catalog = result.ok ? result.value : fallbackCatalog(result.error.rawText);

    const objective = requirements.businessObjective;
    catalog._metadata = {
      model: this.model.modelName,
      agent: 'SourceSystem',
      version: AGENT_VERSION,
      generatedFrom: typeof objective === 'string' ? objective : 'Unknown Business Objective'
    };
    return catalog;
  }
}
