/**
 * Data Designer Agent
 * Designs the target Customer 360 schema from the requirements
 */

import { StructuredRequirements, TargetSchema } from '../types/index.js';
import { IDataDesignerAgent } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { extractObject } from '../utils/json-extraction.js';
import { createLogger } from '../utils/logger.js';
import { normalizeTargetSchema, validateSchema } from '../services/schema-service.js';
import { requestStructured, toPrettyJson } from './model-response.js';

const SYSTEM_PROMPT = `You are a banking data architect. Design Customer 360 schemas as a JSON
object of entities, each mapping attribute names to types: STRING, INT, FLOAT,
DECIMAL, BOOLEAN, DATE, TIMESTAMP, BINARY, ARRAY<type> or STRUCT<name:type, ...>.`;

const logger = createLogger('DataDesignerAgent');

/**
 * Configuration for the Data Designer Agent
 */
export interface DataDesignerAgentConfig {
  /** Entities the designed schema is checked for */
  requiredEntities?: readonly string[];
}

/**
 * Implementation of the Data Designer Agent
 */
export class DataDesignerAgent implements IDataDesignerAgent {
  constructor(
    private model: ModelClient,
    private config: DataDesignerAgentConfig = {}
  ) {}

  async designSchema(requirementsText: string, requirements: StructuredRequirements): Promise<TargetSchema> {
    const prompt = `REQUIREMENTS:
${requirementsText}

STRUCTURED REQUIREMENTS:
${toPrettyJson(requirements)}

Include at least Customer, DemographicProfile and FinancialProfile entities.`;

    const result = await requestStructured(this.model, SYSTEM_PROMPT, prompt, extractObject, logger);
    if (!result.ok) {
      return {};
    }

    const schema = normalizeTargetSchema(result.value);
    const check = validateSchema(schema, this.config.requiredEntities);
    for (const issue of check.issues) {
      logger.warn(issue);
    }
    return schema;
  }
}
