/**
 * Service interfaces for the Customer 360 pipeline
 */

/**
 * Generative model client
 * Takes a system instruction and a user prompt, returns unstructured text
 */
export interface ModelClient {
  readonly modelName: string;
  respond(systemPrompt: string, userPrompt: string): Promise<string>;
}
