export {
  RELATIONSHIP_KEYWORDS,
  REQUIREMENT_KEYWORDS,
  RISK_LABELS,
  VERIFY_METHOD_LABELS,
  relationshipTypeSchema,
  requirementTypeSchema,
  riskSchema,
  verifyMethodSchema,
} from './types.js';
export type { RelationshipType, RequirementType, Risk, VerifyMethod } from './types.js';

export { Element } from './element.js';
export { Requirement } from './requirement.js';
export { Relationship } from './relationship.js';
export { RequirementDiagram, REQUIREMENT_DIAGRAM_HEADER } from './diagram.js';

export {
  elementDefinitionSchema,
  parseRequirementDiagramDefinition,
  requirementDefinitionSchema,
  requirementDiagramDefinitionSchema,
  requirementDiagramFromDefinition,
  requirementRelationshipDefinitionSchema,
} from './definition.js';
export type {
  ElementDefinition,
  RequirementDefinition,
  RequirementDiagramDefinition,
  RequirementDiagramDefinitionInput,
  RequirementRelationshipDefinition,
} from './definition.js';
