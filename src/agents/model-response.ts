/**
 * Shared plumbing for model-backed agents: one model call, then extraction
 */

import { JsonObject } from '../types/index.js';
import { ModelClient } from '../interfaces/services.js';
import { ExtractionResult } from '../utils/json-extraction.js';
import { Logger } from '../utils/logger.js';

/**
 * `error` value written into every fallback payload
 */
export const PARSE_FAILURE_MESSAGE = 'Failed to parse response as JSON';

/**
 * Version stamped into agent metadata
 */
export const AGENT_VERSION = '1.0';

/**
 * Calls the model and extracts a structured value from its reply.
 * Model errors propagate; extraction failures are logged and returned.
 */
export async function requestStructured<T>(
  model: ModelClient,
  systemPrompt: string,
  userPrompt: string,
  extract: (text: string) => ExtractionResult<T>,
  logger: Logger
): Promise<ExtractionResult<T>> {
  logger.debug(`Prompting ${model.modelName}`);
  const reply = await model.respond(systemPrompt, userPrompt);
  const result = extract(reply);

  if (!result.ok) {
    logger.warn(`${result.error.message}; using fallback`);
  }
  return result;
}

export function toPrettyJson(value: JsonObject | JsonObject[]): string {
  return JSON.stringify(value, null, 2);
}
