/**
 * Target schema types
 */

import { ScalarKind } from './common.js';

/**
 * Entity name -> attribute name -> type descriptor string
 * (e.g. "STRING", "ARRAY<DATE>", "STRUCT<firstName:STRING, lastName:STRING>")
 */
export type TargetSchema = Record<string, Record<string, string>>;

/**
 * Field declared inside a STRUCT descriptor
 */
export interface StructField {
  name: string;
  type: TypeDescriptor;
}

/**
 * Why a descriptor string could not be parsed
 */
export type InvalidTypeReason =
  | 'empty'
  | 'unknown_type'
  | 'unbalanced_brackets'
  | 'missing_element_type'
  | 'missing_fields'
  | 'malformed_field'
  | 'duplicate_field'
  | 'nesting_too_deep';

/**
 * Parsed form of a type descriptor string
 */
export type TypeDescriptor =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'array'; element: TypeDescriptor }
  | { kind: 'struct'; fields: StructField[] }
  | { kind: 'invalid'; raw: string; reason: InvalidTypeReason };

/**
 * Result of structural schema checks
 */
export interface SchemaValidationResult {
  valid: boolean;
  issues: string[];
}

/**
 * Coverage of business key terms by a schema
 */
export interface RequirementCoverage {
  coveragePercentage: number;
  termCoverage: Record<string, string>;
  missingTerms: string[];
}
