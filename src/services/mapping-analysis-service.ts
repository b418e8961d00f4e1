/**
 * Mapping Analysis Service
 *
 * Checks on individual mappings that sit beside coverage validation:
 * references into the source catalog and schema, PII protection in
 * transformations, and a breakdown of the transformation expression.
 */

import { TargetSchema } from '../types/schema.js';
import { SourceCatalog } from '../types/project.js';
import {
  Mapping,
  MappingComplexity,
  MappingReferenceCheck,
  PiiHandlingCheck,
  TransformationAnalysis
} from '../types/mapping.js';
import { parseTypeDescriptor } from './schema-service.js';

/**
 * Name fragments that mark an attribute as personally identifiable
 */
export const PII_ATTRIBUTE_TERMS: readonly string[] = [
  'name',
  'address',
  'email',
  'phone',
  'ssn',
  'tax',
  'dob',
  'birth',
  'age',
  'gender',
  'national',
  'passport',
  'license',
  'card_number'
];

/** Transformation fragments that count as protecting a PII value */
export const PII_PROTECTION_TERMS: readonly string[] = ['mask', 'encrypt', 'hash', 'redact', 'tokenize'];

const SQL_KEYWORDS = new Set([
  'AS', 'AND', 'OR', 'NOT', 'NULL', 'IN', 'BETWEEN', 'LIKE', 'CASE', 'WHEN', 'THEN', 'ELSE', 'END'
]);

const CONDITIONAL_MARKERS = ['CASE', 'WHEN', 'IF(', 'IIF('];
const AGGREGATE_FUNCTIONS = new Set(['SUM', 'AVG', 'MIN', 'MAX', 'COUNT']);
const CONVERSION_FUNCTIONS = ['CAST', 'CONVERT', 'UPPER', 'LOWER'];

// ==================== References ====================

/**
 * Checks that each mapping names a catalogued source system, a schema
 * entity and an attribute of that entity. A dotted target must sit on a
 * STRUCT attribute.
 */
export function checkMappingReferences(
  mappings: readonly Mapping[],
  sources: SourceCatalog,
  schema: TargetSchema
): MappingReferenceCheck {
  const issues: string[] = [];

  for (const mapping of mappings) {
    if (!Object.hasOwn(sources, mapping.sourceSystem)) {
      issues.push(`Unknown source system: ${mapping.sourceSystem}`);
    }

    if (!Object.hasOwn(schema, mapping.targetEntity)) {
      issues.push(`Unknown target entity: ${mapping.targetEntity}`);
      continue;
    }

    const entity = schema[mapping.targetEntity];
    const [attribute, ...nested] = mapping.targetAttribute.split('.');
    if (!Object.hasOwn(entity, attribute)) {
      issues.push(`Unknown attribute ${attribute} in entity ${mapping.targetEntity}`);
    } else if (nested.length > 0 && parseTypeDescriptor(entity[attribute]).kind !== 'struct') {
      issues.push(`Attribute ${attribute} is not a STRUCT type`);
    }
  }

  return { valid: issues.length === 0, issues };
}

// ==================== PII ====================

export function checkPiiHandling(attributeName: string, transformationLogic: string): PiiHandlingCheck {
  const name = attributeName.toLowerCase();
  const logic = transformationLogic.toLowerCase();

  const isPii = PII_ATTRIBUTE_TERMS.some(term => name.includes(term));
  if (isPii && !PII_PROTECTION_TERMS.some(term => logic.includes(term))) {
    return {
      compliant: false,
      recommendation: 'Consider masking, encrypting, or tokenizing this PII attribute'
    };
  }

  return { compliant: true, recommendation: 'Transformation appears compliant' };
}

/**
 * One line per mapping whose target looks like PII but is copied unprotected
 */
export function findUnprotectedPii(mappings: readonly Mapping[]): string[] {
  return mappings.flatMap(mapping => {
    const check = checkPiiHandling(mapping.targetAttribute, mapping.transformationLogic);
    return check.compliant ? [] : [`${mapping.targetEntity}.${mapping.targetAttribute}: ${check.recommendation}`];
  });
}

// ==================== Transformations ====================

export function parseTransformationLogic(logic: string): TransformationAnalysis {
  if (!logic.trim()) {
    return { valid: false, error: 'Empty transformation logic' };
  }

  const functions = Array.from(logic.matchAll(/([A-Za-z_]+)\s*\(/g), match => match[1]);
  const called = new Set(functions);
  const identifiers = logic.match(/[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
  const upper = logic.toUpperCase();

  return {
    valid: true,
    functions,
    columns: identifiers.filter(name => !called.has(name) && !SQL_KEYWORDS.has(name)),
    hasConditional: CONDITIONAL_MARKERS.some(marker => upper.includes(marker)),
    hasAggregation: functions.some(name => AGGREGATE_FUNCTIONS.has(name.toUpperCase())),
    originalLogic: logic
  };
}

/**
 * Direct copies are simple, conversions medium, conditionals complex
 */
export function assessMappingComplexity(logic: string): MappingComplexity {
  if (!logic) return 'simple';
  if (logic.includes('CASE') || logic.includes('WHEN')) return 'complex';
  if (CONVERSION_FUNCTIONS.some(name => logic.includes(name))) return 'medium';
  return 'simple';
}
