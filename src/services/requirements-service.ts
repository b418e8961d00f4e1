/**
 * Requirements Service
 * Completeness checks on the structured requirements the Use Case agent returns
 */

import { JsonValue } from '../types/common.js';
import { RequirementsValidationResult, StructuredRequirements } from '../types/project.js';

export const REQUIRED_REQUIREMENT_FIELDS: readonly string[] = [
  'businessObjective',
  'primaryUseCase',
  'keyAttributes'
];

/** Fewer key attributes than this suggests incomplete requirements */
export const MIN_KEY_ATTRIBUTES = 3;

function isBlank(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'object' && Object.keys(value).length === 0;
}

function sizeOf(value: JsonValue): number | null {
  if (Array.isArray(value) || typeof value === 'string') return value.length;
  if (value !== null && typeof value === 'object') return Object.keys(value).length;
  return null;
}

/**
 * Reports missing fields, too few key attributes and absent compliance
 * requirements
 */
export function validateRequirements(requirements: StructuredRequirements): RequirementsValidationResult {
  const issues: string[] = [];

  for (const field of REQUIRED_REQUIREMENT_FIELDS) {
    if (isBlank(requirements[field])) {
      issues.push(`Missing required field: ${field}`);
    }
  }

  const keyAttributes = requirements.keyAttributes;
  if (keyAttributes !== undefined) {
    const count = sizeOf(keyAttributes);
    if (count !== null && count < MIN_KEY_ATTRIBUTES) {
      issues.push('Too few key attributes identified. Requirements may be incomplete.');
    }
  }

  if (isBlank(requirements.complianceRequirements)) {
    issues.push('No compliance requirements identified. For banking, this is unusual.');
  }

  return { valid: issues.length === 0, issues };
}
