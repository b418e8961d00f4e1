/**
 * Schema Service
 * Parses type descriptors, flattens target schemas into addressable paths
 * and runs structural checks on schemas produced by the Data Designer agent.
 */

import { JsonObject, ScalarKind } from '../types/common.js';
import {
  TargetSchema,
  TypeDescriptor,
  StructField,
  InvalidTypeReason,
  SchemaValidationResult,
  RequirementCoverage
} from '../types/schema.js';
import { isJsonObject } from '../utils/json-extraction.js';

const SCALAR_KINDS: readonly ScalarKind[] = [
  'STRING',
  'INT',
  'FLOAT',
  'DECIMAL',
  'BOOLEAN',
  'DATE',
  'TIMESTAMP',
  'BINARY'
];

/** DECIMAL(12,2) and DECIMAL(12) are accepted as DECIMAL */
const PARAMETERIZED_DECIMAL = /^DECIMAL\s*\(\s*\d+\s*(,\s*\d+\s*)?\)$/i;

/** Deepest ARRAY/STRUCT nesting a descriptor may have */
export const MAX_TYPE_NESTING_DEPTH = 64;

/**
 * Entities every Customer 360 schema is expected to declare
 */
export const DEFAULT_REQUIRED_ENTITIES: readonly string[] = [
  'Customer',
  'DemographicProfile',
  'FinancialProfile'
];

/**
 * Business terms looked for in requirements text
 */
export const BANKING_KEY_TERMS: readonly string[] = [
  'demographic',
  'profile',
  'income',
  'assets',
  'liabilities',
  'product',
  'holdings',
  'transaction',
  'risk',
  'channel',
  'interaction',
  'lifetime value',
  'profitability'
];

function isScalarKind(value: string): value is ScalarKind {
  return SCALAR_KINDS.some(kind => kind === value);
}

function invalid(raw: string, reason: InvalidTypeReason): TypeDescriptor {
  return { kind: 'invalid', raw, reason };
}

/**
 * Entity keys starting with "_" carry metadata, not attributes
 */
export function isMetadataKey(name: string): boolean {
  return name.startsWith('_');
}

/**
 * Index of the '>' closing the '<' at `openIndex`, or -1
 */
function findMatchingClose(text: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    if (text[i] === '<') {
      depth++;
    } else if (text[i] === '>') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Splits on commas that are not nested inside <...> or (...)
 */
function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const ch of text) {
    if (ch === '<' || ch === '(') {
      depth++;
    } else if (ch === '>' || ch === ')') {
      depth--;
    }

    if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function parseStructFields(raw: string, inner: string, depth: number): TypeDescriptor {
  const fields: StructField[] = [];
  const seen = new Set<string>();

  for (const part of splitTopLevel(inner)) {
    const separator = part.indexOf(':');
    if (separator === -1) {
      return invalid(raw, 'malformed_field');
    }

    const name = part.slice(0, separator).trim();
    const typeText = part.slice(separator + 1).trim();
    if (!name || !typeText) {
      return invalid(raw, 'malformed_field');
    }
    if (seen.has(name)) {
      return invalid(raw, 'duplicate_field');
    }

    seen.add(name);
    fields.push({ name, type: parseAtDepth(typeText, depth) });
  }

  return { kind: 'struct', fields };
}

/**
 * Parses a descriptor such as "STRING", "ARRAY<DATE>" or
 * "STRUCT<firstName:STRING, lastName:STRING>". Never throws; anything
 * unreadable comes back as an `invalid` descriptor.
 */
export function parseTypeDescriptor(raw: string): TypeDescriptor {
  return parseAtDepth(raw, 0);
}

function parseAtDepth(raw: string, depth: number): TypeDescriptor {
  const text = raw.trim();
  if (!text) {
    return invalid(raw, 'empty');
  }

  const openIndex = text.indexOf('<');
  if (openIndex === -1) {
    const upper = text.toUpperCase();
    if (upper === 'ARRAY') return invalid(raw, 'missing_element_type');
    if (upper === 'STRUCT') return invalid(raw, 'missing_fields');
    if (text.includes('>')) return invalid(raw, 'unbalanced_brackets');
    if (isScalarKind(upper)) return { kind: 'scalar', scalar: upper };
    if (PARAMETERIZED_DECIMAL.test(text)) return { kind: 'scalar', scalar: 'DECIMAL' };
    return invalid(raw, 'unknown_type');
  }

  if (depth >= MAX_TYPE_NESTING_DEPTH) {
    return invalid(raw, 'nesting_too_deep');
  }

  const closeIndex = findMatchingClose(text, openIndex);
  if (closeIndex !== text.length - 1) {
    return invalid(raw, 'unbalanced_brackets');
  }

  const keyword = text.slice(0, openIndex).trim().toUpperCase();
  const inner = text.slice(openIndex + 1, closeIndex);

  if (keyword === 'ARRAY') {
    if (!inner.trim()) {
      return invalid(raw, 'missing_element_type');
    }
    return { kind: 'array', element: parseAtDepth(inner, depth + 1) };
  }

  if (keyword === 'STRUCT') {
    if (!inner.trim()) {
      return invalid(raw, 'missing_fields');
    }
    return parseStructFields(raw, inner, depth + 1);
  }

  return invalid(raw, 'unknown_type');
}

/**
 * First invalid node in a parsed descriptor, searching nested types
 */
export function findInvalidDescriptor(
  descriptor: TypeDescriptor
): Extract<TypeDescriptor, { kind: 'invalid' }> | null {
  switch (descriptor.kind) {
    case 'invalid':
      return descriptor;
    case 'array':
      return findInvalidDescriptor(descriptor.element);
    case 'struct':
      for (const field of descriptor.fields) {
        const found = findInvalidDescriptor(field.type);
        if (found) return found;
      }
      return null;
    default:
      return null;
  }
}

/**
 * Flattens a schema into its coverage universe, grouped by entity.
 * Paths are relative to the entity: "attr" for every attribute plus
 * "attr.field" for each field of a STRUCT attribute (one level only).
 */
export function flattenSchema(schema: TargetSchema): Record<string, string[]> {
  const universe = new Map<string, string[]>();

  for (const [entityName, attributes] of Object.entries(schema)) {
    if (isMetadataKey(entityName)) {
      continue;
    }

    const paths = new Set<string>();
    for (const [attributeName, typeText] of Object.entries(attributes)) {
      paths.add(attributeName);

      const descriptor = parseTypeDescriptor(typeText);
      if (descriptor.kind === 'struct') {
        for (const field of descriptor.fields) {
          paths.add(`${attributeName}.${field.name}`);
        }
      }
    }
    universe.set(entityName, Array.from(paths));
  }

  return Object.fromEntries(universe);
}

/**
 * Structural checks on a target schema: required entities and readable types
 */
export function validateSchema(
  schema: TargetSchema,
  requiredEntities: readonly string[] = DEFAULT_REQUIRED_ENTITIES
): SchemaValidationResult {
  const issues: string[] = [];

  const missingEntities = requiredEntities.filter(entity => !Object.hasOwn(schema, entity));
  if (missingEntities.length > 0) {
    issues.push(`Missing required entities: ${missingEntities.join(', ')}`);
  }

  for (const [entityName, attributes] of Object.entries(schema)) {
    if (isMetadataKey(entityName)) {
      continue;
    }

    for (const [attributeName, typeText] of Object.entries(attributes)) {
      const problem = findInvalidDescriptor(parseTypeDescriptor(typeText));
      if (!problem) {
        continue;
      }

      const path = `${entityName}.${attributeName}`;
      if (problem.reason === 'missing_element_type') {
        issues.push(`ARRAY type needs element type specification for ${path}`);
      } else if (problem.reason === 'missing_fields') {
        issues.push(`STRUCT type needs field specifications for ${path}`);
      } else {
        issues.push(`Invalid data type ${typeText} for ${path}`);
      }
    }
  }

  return { valid: issues.length === 0, issues };
}

/**
 * Which banking key terms mentioned in the requirements are represented by
 * an entity or attribute name in the schema
 */
export function analyzeRequirementCoverage(
  requirementsText: string,
  schema: TargetSchema
): RequirementCoverage {
  const text = requirementsText.toLowerCase();
  const requiredTerms = BANKING_KEY_TERMS.filter(term => text.includes(term));
  const termCoverage: Record<string, string> = {};

  for (const term of BANKING_KEY_TERMS) {
    termCoverage[term] = requiredTerms.includes(term)
      ? locateTerm(term, schema) ?? 'Not covered in schema'
      : 'Not required';
  }

  const missingTerms = requiredTerms.filter(term => !termCoverage[term].startsWith('Covered'));
  const covered = requiredTerms.length - missingTerms.length;

  return {
    coveragePercentage: Math.round((covered / Math.max(requiredTerms.length, 1)) * 100),
    termCoverage,
    missingTerms
  };
}

function locateTerm(term: string, schema: TargetSchema): string | null {
  for (const [entityName, attributes] of Object.entries(schema)) {
    if (entityName.toLowerCase().includes(term)) {
      return `Covered in entity ${entityName}`;
    }
    for (const attributeName of Object.keys(attributes)) {
      if (attributeName.toLowerCase().includes(term)) {
        return `Covered in ${entityName}.${attributeName}`;
      }
    }
  }
  return null;
}

/**
 * Narrows raw Data Designer output into a TargetSchema. Metadata entities,
 * non-object entities and non-string attribute types are dropped.
 */
export function normalizeTargetSchema(value: JsonObject): TargetSchema {
  const entities = new Map<string, Record<string, string>>();

  for (const [entityName, entity] of Object.entries(value)) {
    if (isMetadataKey(entityName) || !isJsonObject(entity)) {
      continue;
    }

    const attributes = new Map<string, string>();
    for (const [attributeName, typeText] of Object.entries(entity)) {
      if (typeof typeText === 'string') {
        attributes.set(attributeName, typeText);
      }
    }
    entities.set(entityName, Object.fromEntries(attributes));
  }

  return Object.fromEntries(entities);
}
