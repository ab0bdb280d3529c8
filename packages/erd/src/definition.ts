import { DefinitionError } from '@mermaid-models/shared';
import { z } from 'zod';

import { Attribute } from './attribute.js';
import { cardinalitySchema } from './cardinality.js';
import { ERD } from './diagram.js';
import { Entity } from './entity.js';
import { Relationship } from './relationship.js';

export const attributeDefinitionSchema = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  primaryKey: z.boolean().default(false),
  foreignKey: z.boolean().default(false),
  unique: z.boolean().default(false),
  comment: z.string().optional(),
});
export type AttributeDefinition = z.infer<typeof attributeDefinitionSchema>;

export const entityDefinitionSchema = z.object({
  id: z.string().min(1),
  alias: z.string().optional(),
  attributes: z.array(attributeDefinitionSchema).default([]),
});
export type EntityDefinition = z.infer<typeof entityDefinitionSchema>;

export const relationshipDefinitionSchema = z.object({
  left: z.string().min(1),
  right: z.string().min(1),
  leftCardinality: cardinalitySchema,
  rightCardinality: cardinalitySchema,
  identifying: z.boolean().default(true),
  label: z.string().optional(),
});
export type RelationshipDefinition = z.infer<typeof relationshipDefinitionSchema>;

export const erdDefinitionSchema = z.object({
  title: z.string().optional(),
  entities: z.array(entityDefinitionSchema).default([]),
  relationships: z.array(relationshipDefinitionSchema).default([]),
});
export type ErdDefinition = z.infer<typeof erdDefinitionSchema>;
export type ErdDefinitionInput = z.input<typeof erdDefinitionSchema>;

function buildAttribute(definition: AttributeDefinition): Attribute {
  const attribute = new Attribute(definition.type, definition.name);
  if (definition.primaryKey) attribute.asPrimaryKey();
  if (definition.foreignKey) attribute.asForeignKey();
  if (definition.unique) attribute.asUnique();
  if (definition.comment !== undefined) attribute.withComment(definition.comment);
  return attribute;
}

function buildEntity(definition: EntityDefinition): Entity {
  const entity = new Entity(definition.id);
  if (definition.alias !== undefined) entity.withAlias(definition.alias);
  definition.attributes.forEach((attribute) => entity.withAttribute(buildAttribute(attribute)));
  return entity;
}

function buildRelationship(definition: RelationshipDefinition): Relationship {
  const relationship = new Relationship(
    definition.left,
    definition.right,
    definition.leftCardinality,
    definition.rightCardinality,
  );
  if (!definition.identifying) relationship.asNonIdentifying();
  if (definition.label !== undefined) relationship.withLabel(definition.label);
  return relationship;
}

export function parseErdDefinition(input: unknown): ErdDefinition {
  const parsed = erdDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new DefinitionError('ERD definition', parsed.error);
  }
  return parsed.data;
}

/** Entities are added before relationships, so declared entities keep their attributes. */
export function erdFromDefinition(input: unknown): ERD {
  const definition = parseErdDefinition(input);
  const diagram = new ERD();
  if (definition.title !== undefined) diagram.withTitle(definition.title);
  definition.entities.forEach((entity) => diagram.addEntity(buildEntity(entity)));
  definition.relationships.forEach((relationship) =>
    diagram.addRelationship(buildRelationship(relationship)),
  );
  return diagram;
}
