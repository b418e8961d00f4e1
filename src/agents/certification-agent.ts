/**
 * Certification Agent
 * Assesses quality, compliance and coverage of the designed data product
 */

import { createHash } from 'node:crypto';
import { CertificationReport, JsonObject, Mapping, TargetSchema } from '../types/index.js';
import { ICertificationAgent } from '../interfaces/agents.js';
import { ModelClient } from '../interfaces/services.js';
import { extractObject } from '../utils/json-extraction.js';
import { createLogger } from '../utils/logger.js';
import { AGENT_VERSION, PARSE_FAILURE_MESSAGE, requestStructured, toPrettyJson } from './model-response.js';

const SYSTEM_PROMPT = `You are a banking data governance officer. Certify Customer 360 data
products and respond with a JSON object.`;

const logger = createLogger('CertificationAgent');

/**
 * Configuration for the Certification Agent
 */
export interface CertificationAgentConfig {
  now: () => Date;
}

const DEFAULT_CONFIG: CertificationAgentConfig = {
  now: () => new Date()
};

function fallbackReport(rawResponse: string): CertificationReport {
  return {
    error: PARSE_FAILURE_MESSAGE,
    rawResponse,
    dataQualityScore: 0,
    complianceStatus: 'Rejected',
    privacyAssessment: 'Unable to assess due to parsing error',
    dataCoverage: 0,
    missingElements: ['Entire assessment due to parsing error'],
    recommendations: ['Retry certification process']
  };
}

/**
 * Stable id for a requirements/schema pair, e.g. "CERT-0421"
 */
export function certificationId(requirements: JsonObject, schema: TargetSchema): string {
  const digest = createHash('sha256')
    .update(JSON.stringify(requirements))
    .update(JSON.stringify(schema))
    .digest('hex');
  const bucket = Number.parseInt(digest.slice(0, 8), 16) % 10000;
  return `CERT-${bucket.toString().padStart(4, '0')}`;
}

/**
 * Implementation of the Certification Agent
 */
export class CertificationAgent implements ICertificationAgent {
  private config: CertificationAgentConfig;

  constructor(
    private model: ModelClient,
    config: Partial<CertificationAgentConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async certifyDataProduct(
    schema: TargetSchema,
    mappings: Mapping[],
    requirements: JsonObject
  ): Promise<CertificationReport> {
    const prompt = `REQUIREMENTS:
${toPrettyJson(requirements)}

SCHEMA:
${toPrettyJson(schema)}

MAPPINGS (${mappings.length}):
${JSON.stringify(mappings, null, 2)}

Return dataQualityScore (0-100), complianceStatus (Approved, Conditionally Approved
or Rejected), privacyAssessment, dataCoverage, missingElements and recommendations.`;

    const result = await requestStructured(this.model, SYSTEM_PROMPT, prompt, extractObject, logger);
    const report = result.ok ? result.value : fallbackReport(result.error.rawText);

    report._metadata = {
      model: this.model.modelName,
      agent: 'Certification',
      version: AGENT_VERSION,
      certificationDate: this.config.now().toISOString().slice(0, 10),
      certificationId: certificationId(requirements, schema)
    };
    return report;
  }
}
