/**
 * JSON codec for persisted project state
 *
 * Records are stored field-for-field as JSON with dates as ISO strings.
 * Decoding checks every field and restores Date values.
 */

import {
  AgentName,
  AgentTaskStatus,
  JsonObject,
  JsonValue,
  PipelineStage,
  ProjectStatus
} from '../types/common.js';
import { TargetSchema } from '../types/schema.js';
import { Mapping, MappingMetadata, ValidationResult } from '../types/mapping.js';
import { AgentTask, ProjectState } from '../types/project.js';
import { isJsonObject } from '../utils/json-extraction.js';

const PROJECT_STATUSES: readonly ProjectStatus[] = ['initialized', 'processing', 'completed', 'failed'];
const PIPELINE_STAGES: readonly PipelineStage[] = [
  'setup',
  'requirements_analysis',
  'schema_design',
  'mapping_generation',
  'certification',
  'complete'
];
const AGENT_NAMES: readonly AgentName[] = ['use_case', 'data_designer', 'source_system', 'mapping', 'certification'];
const AGENT_TASK_STATUSES: readonly AgentTaskStatus[] = ['pending', 'running', 'succeeded', 'failed'];

/**
 * Thrown when a stored record does not match the ProjectState shape
 */
export class StateDecodeError extends Error {
  constructor(public readonly path: string, expected: string) {
    super(`Invalid project state at '${path}': expected ${expected}`);
    this.name = 'StateDecodeError';
  }
}

// ==================== Primitive decoders ====================

function asObject(value: JsonValue | undefined, path: string): JsonObject {
  if (!isJsonObject(value)) throw new StateDecodeError(path, 'object');
  return value;
}

function asString(value: JsonValue | undefined, path: string): string {
  if (typeof value !== 'string') throw new StateDecodeError(path, 'string');
  return value;
}

function asNumber(value: JsonValue | undefined, path: string): number {
  if (typeof value !== 'number') throw new StateDecodeError(path, 'number');
  return value;
}

function asBoolean(value: JsonValue | undefined, path: string): boolean {
  if (typeof value !== 'boolean') throw new StateDecodeError(path, 'boolean');
  return value;
}

function asArray(value: JsonValue | undefined, path: string): JsonValue[] {
  if (!Array.isArray(value)) throw new StateDecodeError(path, 'array');
  return value;
}

function asStringArray(value: JsonValue | undefined, path: string): string[] {
  return asArray(value, path).map((item, i) => asString(item, `${path}[${i}]`));
}

function asDate(value: JsonValue | undefined, path: string): Date {
  const date = new Date(asString(value, path));
  if (Number.isNaN(date.getTime())) throw new StateDecodeError(path, 'ISO date string');
  return date;
}

function asOneOf<T extends string>(allowed: readonly T[], value: JsonValue | undefined, path: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) throw new StateDecodeError(path, allowed.join(' | '));
  return match;
}

function isPresent(record: JsonObject, key: string): boolean {
  return Object.hasOwn(record, key) && record[key] !== null;
}

// ==================== Structured decoders ====================

function decodeSchema(value: JsonValue | undefined, path: string): TargetSchema {
  return Object.fromEntries(
    Object.entries(asObject(value, path)).map(([entityName, entity]): [string, Record<string, string>] => [
      entityName,
      Object.fromEntries(
        Object.entries(asObject(entity, `${path}.${entityName}`)).map(([attributeName, typeText]): [string, string] => [
          attributeName,
          asString(typeText, `${path}.${entityName}.${attributeName}`)
        ])
      )
    ])
  );
}

function decodeMetadata(value: JsonValue | undefined, path: string): MappingMetadata {
  const record = asObject(value, path);
  return {
    generatedBy: asString(record.generatedBy, `${path}.generatedBy`),
    version: asString(record.version, `${path}.version`),
    model: asString(record.model, `${path}.model`)
  };
}

function decodeMapping(value: JsonValue, path: string): Mapping {
  const record = asObject(value, path);
  const mapping: Mapping = {
    sourceSystem: asString(record.sourceSystem, `${path}.sourceSystem`),
    sourceTable: asString(record.sourceTable, `${path}.sourceTable`),
    sourceAttribute: asString(record.sourceAttribute, `${path}.sourceAttribute`),
    targetEntity: asString(record.targetEntity, `${path}.targetEntity`),
    targetAttribute: asString(record.targetAttribute, `${path}.targetAttribute`),
    transformationLogic: asString(record.transformationLogic, `${path}.transformationLogic`)
  };
  if (isPresent(record, 'metadata')) mapping.metadata = decodeMetadata(record.metadata, `${path}.metadata`);
  if (isPresent(record, 'error')) mapping.error = asString(record.error, `${path}.error`);
  if (isPresent(record, 'rawResponse')) mapping.rawResponse = asString(record.rawResponse, `${path}.rawResponse`);
  return mapping;
}

function decodeValidation(value: JsonValue | undefined, path: string): ValidationResult {
  const record = asObject(value, path);
  const unmappedAttributes = Object.fromEntries(
    Object.entries(asObject(record.unmappedAttributes, `${path}.unmappedAttributes`)).map(([entity, paths]): [string, string[]] => [
      entity,
      asStringArray(paths, `${path}.unmappedAttributes.${entity}`)
    ])
  );

  return {
    totalAttributes: asNumber(record.totalAttributes, `${path}.totalAttributes`),
    mappedAttributes: asNumber(record.mappedAttributes, `${path}.mappedAttributes`),
    coveragePercentage: asNumber(record.coveragePercentage, `${path}.coveragePercentage`),
    unmappedAttributes,
    mappingIssues: asStringArray(record.mappingIssues, `${path}.mappingIssues`),
    validationPassed: asBoolean(record.validationPassed, `${path}.validationPassed`)
  };
}

function decodeAgentTask(value: JsonValue, path: string): AgentTask {
  const record = asObject(value, path);
  const task: AgentTask = {
    agentName: asOneOf(AGENT_NAMES, record.agentName, `${path}.agentName`),
    taskType: asString(record.taskType, `${path}.taskType`),
    input: asObject(record.input, `${path}.input`),
    status: asOneOf(AGENT_TASK_STATUSES, record.status, `${path}.status`)
  };
  if (Object.hasOwn(record, 'output')) task.output = record.output;
  if (isPresent(record, 'error')) task.error = asString(record.error, `${path}.error`);
  if (isPresent(record, 'startTime')) task.startTime = asDate(record.startTime, `${path}.startTime`);
  if (isPresent(record, 'completionTime')) task.completionTime = asDate(record.completionTime, `${path}.completionTime`);
  return task;
}

// ==================== Public API ====================

export function serializeProjectState(state: ProjectState): string {
  return JSON.stringify(state);
}

/**
 * Decodes a stored record. Throws StateDecodeError (or SyntaxError for
 * non-JSON text) when the record is not a valid ProjectState.
 */
export function deserializeProjectState(serialized: string): ProjectState {
  const parsed: unknown = JSON.parse(serialized);
  if (!isJsonObject(parsed)) {
    throw new StateDecodeError('$', 'object');
  }

  const state: ProjectState = {
    projectId: asString(parsed.projectId, 'projectId'),
    status: asOneOf(PROJECT_STATUSES, parsed.status, 'status'),
    currentStage: asOneOf(PIPELINE_STAGES, parsed.currentStage, 'currentStage'),
    requirements: asObject(parsed.requirements, 'requirements'),
    errors: asStringArray(parsed.errors, 'errors'),
    agentTasks: asArray(parsed.agentTasks, 'agentTasks').map((task, i) => decodeAgentTask(task, `agentTasks[${i}]`)),
    startTime: asDate(parsed.startTime, 'startTime')
  };

  if (isPresent(parsed, 'schema')) state.schema = decodeSchema(parsed.schema, 'schema');
  if (isPresent(parsed, 'dataSources')) state.dataSources = asObject(parsed.dataSources, 'dataSources');
  if (isPresent(parsed, 'mappings')) {
    state.mappings = asArray(parsed.mappings, 'mappings').map((item, i) => decodeMapping(item, `mappings[${i}]`));
  }
  if (isPresent(parsed, 'mappingValidation')) {
    state.mappingValidation = decodeValidation(parsed.mappingValidation, 'mappingValidation');
  }
  if (isPresent(parsed, 'certification')) state.certification = asObject(parsed.certification, 'certification');
  if (isPresent(parsed, 'completionTime')) state.completionTime = asDate(parsed.completionTime, 'completionTime');

  return state;
}

/**
 * Deep copy through the codec, so callers never share mutable state
 */
export function cloneProjectState(state: ProjectState): ProjectState {
  return deserializeProjectState(serializeProjectState(state));
}
