/**
 * Use Case Agent
 * Interprets free-text business requirements for a Customer 360 data product
 */

import { StructuredRequirements } from '../types/index.js';
import { IUseCaseAgent } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { extractObject } from '../utils/json-extraction.js';
import { createLogger } from '../utils/logger.js';
import { validateRequirements } from '../services/requirements-service.js';
import { AGENT_VERSION, PARSE_FAILURE_MESSAGE, requestStructured } from './model-response.js';

const SYSTEM_PROMPT = `You are a banking domain expert who interprets business requirements
for Customer 360 data products. Respond with a single JSON object.`;

const logger = createLogger('UseCaseAgent');

/**
 * Collapses whitespace and drops characters outside basic punctuation
 */
export function preprocessRequirementsText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[^\w\s.,;:?!()-]/g, '')
    .trim();
}

function buildPrompt(cleanedText: string): string {
  return `BUSINESS REQUIREMENTS:
${cleanedText}

Extract as JSON: "businessObjective", "primaryUseCase", "secondaryUseCases",
"keyAttributes", "customerSegments", "complianceRequirements", "stakeholders", "kpis".`;
}

/**
 * Implementation of the Use Case Agent
 */
export class UseCaseAgent implements IUseCaseAgent {
  constructor(private model: ModelClient) {}

  async analyzeRequirements(requirementsText: string): Promise<StructuredRequirements> {
    const result = await requestStructured(
      this.model,
      SYSTEM_PROMPT,
      buildPrompt(preprocessRequirementsText(requirementsText)),
      extractObject,
      logger
    );

    if (result.ok) {
      for (const issue of validateRequirements(result.value).issues) {
        logger.warn(issue);
      }
    }

    const requirements: StructuredRequirements = result.ok
      ? result.value
      : {
          error: PARSE_FAILURE_MESSAGE,
          rawResponse: result.error.rawText,
          businessObjective: 'Unknown - parsing error',
          primaryUseCase: 'Unknown - parsing error',
          keyAttributes: []
        };

    requirements.processingInfo = {
      model: this.model.modelName,
      agent: 'UseCase',
      version: AGENT_VERSION
    };
    return requirements;
  }
}
