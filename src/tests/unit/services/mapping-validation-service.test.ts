/**
 * Unit tests for the Mapping Validation Service
 */

import { describe, it, expect } from 'vitest';
import {
  COVERAGE_THRESHOLD_PERCENT,
  normalizeMappings,
  validateMappings
} from '../../../services/mapping-validation-service.js';
import { Mapping, TargetSchema } from '../../../types/index.js';

function mapping(targetEntity: string, targetAttribute: string): Mapping {
  return {
    sourceSystem: 'Core Banking System',
    sourceTable: 'CUSTOMER_MASTER',
    sourceAttribute: 'SRC_COL',
    targetEntity,
    targetAttribute,
    transformationLogic: ''
  };
}

const FIVE_ATTRIBUTES: TargetSchema = {
  Customer: { a: 'STRING', b: 'STRING', c: 'INT', d: 'DATE', e: 'BOOLEAN' }
};

describe('MappingValidationService', () => {
  describe('validateMappings', () => {
    it('should report a struct attribute and its fields as unmapped with zero coverage', () => {
      const result = validateMappings({ Entity: { attr: 'STRUCT<a:STRING,b:INT>' } }, []);

      expect(result.unmappedAttributes).toEqual({ Entity: ['attr', 'attr.a', 'attr.b'] });
      expect(result.totalAttributes).toBe(3);
      expect(result.coveragePercentage).toBe(0);
      expect(result.validationPassed).toBe(false);
    });

    it('should count a repeated target path once', () => {
      const once = validateMappings(FIVE_ATTRIBUTES, [mapping('Customer', 'a')]);
      const twice = validateMappings(FIVE_ATTRIBUTES, [mapping('Customer', 'a'), mapping('Customer', 'a')]);

      expect(twice.mappedAttributes).toBe(once.mappedAttributes);
      expect(twice.mappedAttributes).toBe(1);
    });

    it('should pass at exactly the coverage threshold', () => {
      const result = validateMappings(
        FIVE_ATTRIBUTES,
        ['a', 'b', 'c', 'd'].map(attribute => mapping('Customer', attribute))
      );

      expect(result.coveragePercentage).toBe(80);
      expect(result.coveragePercentage).toBe(COVERAGE_THRESHOLD_PERCENT);
      expect(result.mappingIssues).toEqual([]);
      expect(result.validationPassed).toBe(true);
      expect(result.unmappedAttributes).toEqual({ Customer: ['e'] });
    });

    it('should fail below the coverage threshold', () => {
      const result = validateMappings(
        FIVE_ATTRIBUTES,
        ['a', 'b', 'c'].map(attribute => mapping('Customer', attribute))
      );

      expect(result.coveragePercentage).toBe(60);
      expect(result.validationPassed).toBe(false);
    });

    it('should record one issue for an unknown entity without changing the mapped count', () => {
      const result = validateMappings(FIVE_ATTRIBUTES, [mapping('Customer', 'a'), mapping('Ghost', 'id')]);

      expect(result.mappingIssues).toEqual(["Mapping #2: Target entity 'Ghost' not found in schema"]);
      expect(result.mappedAttributes).toBe(1);
    });

    it('should report unknown attributes and unknown struct bases', () => {
      const schema: TargetSchema = { Customer: { name: 'STRUCT<first:STRING>' } };
      const result = validateMappings(schema, [
        mapping('Customer', 'email'),
        mapping('Customer', 'address.city')
      ]);

      expect(result.mappingIssues).toEqual([
        "Mapping #1: Attribute 'email' not found in entity 'Customer'",
        "Mapping #2: Base attribute 'address' not found in entity 'Customer'"
      ]);
      expect(result.mappedAttributes).toBe(0);
    });

    it('should accept an undeclared struct field by default', () => {
      const schema: TargetSchema = { Customer: { name: 'STRUCT<first:STRING>' } };
      const result = validateMappings(schema, [mapping('Customer', 'name.middle')]);

      expect(result.mappingIssues).toEqual([]);
      expect(result.mappedAttributes).toBe(1);
      expect(result.totalAttributes).toBe(2);
      expect(result.coveragePercentage).toBe(50);
    });

    it('should reject an undeclared struct field in strict mode', () => {
      const schema: TargetSchema = { Customer: { name: 'STRUCT<first:STRING>' } };
      const result = validateMappings(
        schema,
        [mapping('Customer', 'name.middle'), mapping('Customer', 'name.first')],
        { strictStructFields: true }
      );

      expect(result.mappingIssues).toEqual([
        "Mapping #1: Field 'middle' not declared in STRUCT attribute 'Customer.name'"
      ]);
      expect(result.mappedAttributes).toBe(1);
    });

    it('should cap coverage at 100 when undeclared fields are mapped', () => {
      const schema: TargetSchema = { Customer: { name: 'STRUCT<first:STRING>' } };
      const result = validateMappings(schema, [
        mapping('Customer', 'name'),
        mapping('Customer', 'name.first'),
        mapping('Customer', 'name.middle')
      ]);

      expect(result.mappedAttributes).toBe(3);
      expect(result.coveragePercentage).toBe(100);
    });

    it('should treat a malformed struct as a plain attribute', () => {
      const result = validateMappings({ Customer: { address: 'STRUCT<street:STRING' } }, []);

      expect(result.unmappedAttributes).toEqual({ Customer: ['address'] });
      expect(result.totalAttributes).toBe(1);
    });

    it('should not treat inherited object keys as attributes', () => {
      const result = validateMappings(FIVE_ATTRIBUTES, [mapping('Customer', 'constructor')]);

      expect(result.mappingIssues).toEqual([
        "Mapping #1: Attribute 'constructor' not found in entity 'Customer'"
      ]);
    });

    it('should return zero coverage for an empty schema', () => {
      const result = validateMappings({}, []);

      expect(result.totalAttributes).toBe(0);
      expect(result.coveragePercentage).toBe(0);
      expect(result.validationPassed).toBe(false);
    });

    it('should validate the single-customer scenario', () => {
      const result = validateMappings(
        { Customer: { customerId: 'STRING', customerSegment: 'STRING' } },
        [mapping('Customer', 'customerId')]
      );

      expect(result).toEqual({
        totalAttributes: 2,
        mappedAttributes: 1,
        coveragePercentage: 50,
        unmappedAttributes: { Customer: ['customerSegment'] },
        mappingIssues: [],
        validationPassed: false
      });
    });

    it('should round coverage to two decimals', () => {
      const schema: TargetSchema = { Customer: { a: 'STRING', b: 'STRING', c: 'STRING' } };

      expect(validateMappings(schema, [mapping('Customer', 'a')]).coveragePercentage).toBe(33.33);
    });
  });

  describe('normalizeMappings', () => {
    it('should coerce fields to strings and drop non-object items', () => {
      const mappings = normalizeMappings([
        {
          sourceSystem: 'CRM System',
          sourceTable: 'CONTACTS',
          sourceAttribute: 'AGE',
          targetEntity: 'DemographicProfile',
          targetAttribute: 'age',
          transformationLogic: null,
          _metadata: { generatedBy: 'MappingAgent', version: 1, model: 'test-model' }
        },
        'not a mapping',
        { targetEntity: 'Customer', targetAttribute: 'customerId', error: 'bad' }
      ]);

      expect(mappings).toEqual([
        {
          sourceSystem: 'CRM System',
          sourceTable: 'CONTACTS',
          sourceAttribute: 'AGE',
          targetEntity: 'DemographicProfile',
          targetAttribute: 'age',
          transformationLogic: '',
          metadata: { generatedBy: 'MappingAgent', version: '1', model: 'test-model' }
        },
        {
          sourceSystem: '',
          sourceTable: '',
          sourceAttribute: '',
          targetEntity: 'Customer',
          targetAttribute: 'customerId',
          transformationLogic: '',
          error: 'bad'
        }
      ]);
    });
  });
});
