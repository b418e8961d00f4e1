/**
 * Mapping Validation Service
 * Checks source-to-target mappings against a target schema and computes
 * attribute coverage.
 */

import { JsonObject, JsonValue } from '../types/common.js';
import { TargetSchema } from '../types/schema.js';
import {
  Mapping,
  MappingMetadata,
  MappingValidationOptions,
  ValidationResult
} from '../types/mapping.js';
import { flattenSchema, parseTypeDescriptor } from './schema-service.js';
import { isJsonObject } from '../utils/json-extraction.js';

/**
 * Minimum coverage for a mapping set to pass validation
 */
export const COVERAGE_THRESHOLD_PERCENT = 80;

const DEFAULT_OPTIONS: MappingValidationOptions = {
  strictStructFields: false
};

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Returns an issue message when `subField` is not declared on the STRUCT
 * attribute `base`, or null when it is
 */
function checkStructField(
  schema: TargetSchema,
  entity: string,
  base: string,
  subField: string,
  index: number
): string | null {
  const descriptor = parseTypeDescriptor(schema[entity][base]);
  const declared = descriptor.kind === 'struct' && descriptor.fields.some(field => field.name === subField);
  return declared
    ? null
    : `Mapping #${index}: Field '${subField}' not declared in STRUCT attribute '${entity}.${base}'`;
}

/**
 * Validates mappings against a schema.
 *
 * A dotted target ("address.city") is accepted when its base attribute is
 * declared, whether or not the sub-field is; `strictStructFields` turns that
 * leniency off.
 */
export function validateMappings(
  schema: TargetSchema,
  mappings: readonly Mapping[],
  options: Partial<MappingValidationOptions> = {}
): ValidationResult {
  const config = { ...DEFAULT_OPTIONS, ...options };
  const universe = flattenSchema(schema);

  const mapped = new Map<string, Set<string>>();
  for (const entity of Object.keys(universe)) {
    mapped.set(entity, new Set());
  }

  const mappingIssues: string[] = [];

  mappings.forEach((mapping, idx) => {
    const index = idx + 1;
    const { targetEntity, targetAttribute } = mapping;
    const mappedPaths = mapped.get(targetEntity);

    if (!mappedPaths) {
      mappingIssues.push(`Mapping #${index}: Target entity '${targetEntity}' not found in schema`);
      return;
    }

    const attributes = schema[targetEntity];
    const dot = targetAttribute.indexOf('.');

    if (dot !== -1) {
      const base = targetAttribute.slice(0, dot);
      if (!Object.hasOwn(attributes, base)) {
        mappingIssues.push(`Mapping #${index}: Base attribute '${base}' not found in entity '${targetEntity}'`);
        return;
      }
      if (config.strictStructFields) {
        const issue = checkStructField(schema, targetEntity, base, targetAttribute.slice(dot + 1), index);
        if (issue) {
          mappingIssues.push(issue);
          return;
        }
      }
    } else if (!Object.hasOwn(attributes, targetAttribute)) {
      mappingIssues.push(`Mapping #${index}: Attribute '${targetAttribute}' not found in entity '${targetEntity}'`);
      return;
    }

    mappedPaths.add(targetAttribute);
  });

  let totalAttributes = 0;
  let mappedAttributes = 0;
  const unmappedAttributes = new Map<string, string[]>();

  for (const [entity, paths] of Object.entries(universe)) {
    const mappedPaths = mapped.get(entity) ?? new Set<string>();
    totalAttributes += paths.length;
    mappedAttributes += mappedPaths.size;

    const unmapped = paths.filter(path => !mappedPaths.has(path));
    if (unmapped.length > 0) {
      unmappedAttributes.set(entity, unmapped);
    }
  }

  const coveragePercentage = totalAttributes > 0
    ? Math.min(100, roundTo2((mappedAttributes * 100) / totalAttributes))
    : 0;

  return {
    totalAttributes,
    mappedAttributes,
    coveragePercentage,
    unmappedAttributes: Object.fromEntries(unmappedAttributes),
    mappingIssues,
    validationPassed: mappingIssues.length === 0 && coveragePercentage >= COVERAGE_THRESHOLD_PERCENT
  };
}

function stringField(record: JsonObject, key: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function parseMetadata(value: JsonValue | undefined): MappingMetadata | undefined {
  if (!isJsonObject(value)) {
    return undefined;
  }
  return {
    generatedBy: stringField(value, 'generatedBy'),
    version: stringField(value, 'version'),
    model: stringField(value, 'model')
  };
}

/**
 * Narrows raw Mapping agent output into Mapping records. Non-object items are
 * dropped; missing fields become empty strings.
 */
export function normalizeMappings(values: readonly JsonValue[]): Mapping[] {
  const mappings: Mapping[] = [];

  for (const value of values) {
    if (!isJsonObject(value)) {
      continue;
    }

    const mapping: Mapping = {
      sourceSystem: stringField(value, 'sourceSystem'),
      sourceTable: stringField(value, 'sourceTable'),
      sourceAttribute: stringField(value, 'sourceAttribute'),
      targetEntity: stringField(value, 'targetEntity'),
      targetAttribute: stringField(value, 'targetAttribute'),
      transformationLogic: stringField(value, 'transformationLogic')
    };

    const metadata = parseMetadata(value._metadata ?? value.metadata);
    if (metadata) mapping.metadata = metadata;
    if (typeof value.error === 'string') mapping.error = value.error;
    if (typeof value.rawResponse === 'string') mapping.rawResponse = value.rawResponse;

    mappings.push(mapping);
  }

  return mappings;
}
