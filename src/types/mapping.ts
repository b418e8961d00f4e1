/**
 * Source-to-target mapping types
 */

/**
 * Provenance stamped on generated mappings
 */
export interface MappingMetadata {
  generatedBy: string;
  version: string;
  model: string;
}

/**
 * One proposed link from a source attribute to a target attribute
 */
export interface Mapping {
  sourceSystem: string;
  sourceTable: string;
  sourceAttribute: string;
  targetEntity: string;
  /** Dot-path into the target entity, e.g. "name.firstName" */
  targetAttribute: string;
  /** Empty means direct copy */
  transformationLogic: string;
  metadata?: MappingMetadata;
  /** Set only on the fallback mapping produced when model output is unparseable */
  error?: string;
  rawResponse?: string;
}

/**
 * Result of validating mappings against a target schema
 */
export interface ValidationResult {
  totalAttributes: number;
  mappedAttributes: number;
  coveragePercentage: number;
  /** Entity -> uncovered paths, relative to the entity */
  unmappedAttributes: Record<string, string[]>;
  mappingIssues: string[];
  validationPassed: boolean;
}

/**
 * Options for mapping validation
 */
export interface MappingValidationOptions {
  /** Reject sub-field targets that the STRUCT does not declare */
  strictStructFields: boolean;
}

/**
 * Outcome of checking one attribute's transformation for PII protection
 */
export interface PiiHandlingCheck {
  compliant: boolean;
  recommendation: string;
}

/**
 * Result of checking mapping references against the source catalog and schema
 */
export interface MappingReferenceCheck {
  valid: boolean;
  issues: string[];
}

/**
 * Pieces of a SQL-like transformation expression
 */
export type TransformationAnalysis =
  | { valid: false; error: string }
  | {
      valid: true;
      functions: string[];
      /** Identifiers that are neither called nor SQL keywords */
      columns: string[];
      hasConditional: boolean;
      hasAggregation: boolean;
      originalLogic: string;
    };

export type MappingComplexity = 'simple' | 'medium' | 'complex';
