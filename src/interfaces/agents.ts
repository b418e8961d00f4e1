/**
 * Agent interfaces for the Customer 360 pipeline
 */

import {
  JsonObject,
  TargetSchema,
  Mapping,
  StructuredRequirements,
  SourceCatalog,
  CertificationReport
} from '../types/index.js';

/**
 * Use Case Agent interface
 * Turns free-text business requirements into structured requirements
 */
export interface IUseCaseAgent {
  analyzeRequirements(requirementsText: string): Promise<StructuredRequirements>;
}

/**
 * Data Designer Agent interface
 * Designs the target Customer 360 schema
 */
export interface IDataDesignerAgent {
  designSchema(requirementsText: string, requirements: StructuredRequirements): Promise<TargetSchema>;
}

/**
 * Source System Agent interface
 * Catalogs candidate banking source systems
 */
export interface ISourceSystemAgent {
  identifySources(requirementsText: string, requirements: StructuredRequirements): Promise<SourceCatalog>;
}

/**
 * Mapping Agent interface
 * Proposes source-to-target field mappings
 */
export interface IMappingAgent {
  generateMappings(schema: TargetSchema, sources: SourceCatalog): Promise<Mapping[]>;
}

/**
 * Certification Agent interface
 * Produces the governance certification for the data product
 */
export interface ICertificationAgent {
  certifyDataProduct(
    schema: TargetSchema,
    mappings: Mapping[],
    requirements: JsonObject
  ): Promise<CertificationReport>;
}

/**
 * The five agents the orchestrator sequences
 */
export interface Customer360Agents {
  useCase: IUseCaseAgent;
  dataDesigner: IDataDesignerAgent;
  sourceSystem: ISourceSystemAgent;
  mapping: IMappingAgent;
  certification: ICertificationAgent;
}
