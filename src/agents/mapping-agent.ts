/**
 * Mapping Agent
 * Proposes source-to-target attribute mappings
 */

import { Mapping, SourceCatalog, TargetSchema } from '../types/index.js';
import { IMappingAgent } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { extractArray } from '../utils/json-extraction.js';
import { createLogger } from '../utils/logger.js';
import { normalizeMappings } from '../services/mapping-validation-service.js';
import { checkMappingReferences, findUnprotectedPii } from '../services/mapping-analysis-service.js';
import { AGENT_VERSION, PARSE_FAILURE_MESSAGE, requestStructured, toPrettyJson } from './model-response.js';

const SYSTEM_PROMPT = `You are a banking data integration engineer. Map source attributes to
target schema attributes and respond with a JSON array of mappings.`;

const logger = createLogger('MappingAgent');

function fallbackMappings(rawResponse: string): Mapping[] {
  return [
    {
      sourceSystem: 'Core Banking System',
      sourceTable: 'CUSTOMER_MASTER',
      sourceAttribute: 'CUST_ID',
      targetEntity: 'Customer',
      targetAttribute: 'customerId',
      transformationLogic: 'CAST(CUST_ID AS STRING)',
      error: PARSE_FAILURE_MESSAGE,
      rawResponse
    }
  ];
}

/**
 * Implementation of the Mapping Agent
 */
export class MappingAgent implements IMappingAgent {
  constructor(private model: ModelClient) {}

  async generateMappings(schema: TargetSchema, sources: SourceCatalog): Promise<Mapping[]> {
    const prompt = `TARGET SCHEMA:
${toPrettyJson(schema)}

SOURCE SYSTEMS:
${toPrettyJson(sources)}

Each mapping needs sourceSystem, sourceTable, sourceAttribute, targetEntity,
targetAttribute (use "attr.field" for STRUCT fields) and transformationLogic.`;

    const result = await requestStructured(this.model, SYSTEM_PROMPT, prompt, extractArray, logger);
    const mappings = result.ok ? normalizeMappings(result.value) : fallbackMappings(result.error.rawText);

    const review = [...checkMappingReferences(mappings, sources, schema).issues, ...findUnprotectedPii(mappings)];
    for (const issue of review) {
      logger.warn(issue);
    }

    return mappings.map(mapping => ({
      ...mapping,
      metadata: { generatedBy: 'MappingAgent', version: AGENT_VERSION, model: this.model.modelName }
    }));
  }
}
