export { cardinalitySchema, cardinalitySymbol, CARDINALITY_SYMBOLS } from './cardinality.js';
export type { Cardinality, Side } from './cardinality.js';

export {
  Attribute,
  emptyKeyConstraints,
  formatKeyConstraints,
  hasConstraints,
} from './attribute.js';
export type { KeyConstraints } from './attribute.js';

export { Entity, entityIdSchema, toEntityId } from './entity.js';
export type { EntityId } from './entity.js';

export { Relationship } from './relationship.js';
export { ERD, ERD_HEADER } from './diagram.js';

export {
  attributeDefinitionSchema,
  entityDefinitionSchema,
  erdDefinitionSchema,
  erdFromDefinition,
  parseErdDefinition,
  relationshipDefinitionSchema,
} from './definition.js';
export type {
  AttributeDefinition,
  EntityDefinition,
  ErdDefinition,
  ErdDefinitionInput,
  RelationshipDefinition,
} from './definition.js';
