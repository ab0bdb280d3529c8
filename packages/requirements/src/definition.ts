import { DefinitionError } from '@mermaid-models/shared';
import { z } from 'zod';

import { RequirementDiagram } from './diagram.js';
import { Element } from './element.js';
import { Relationship } from './relationship.js';
import { Requirement } from './requirement.js';
import {
  relationshipTypeSchema,
  requirementTypeSchema,
  riskSchema,
  verifyMethodSchema,
} from './types.js';

export const elementDefinitionSchema = z.object({
  name: z.string().min(1),
  kind: z.string(),
  docref: z.string().optional(),
});
export type ElementDefinition = z.infer<typeof elementDefinitionSchema>;

export const requirementDefinitionSchema = z.object({
  kind: requirementTypeSchema.default('Default'),
  name: z.string().min(1),
  id: z.string().min(1),
  text: z.string().optional(),
  risk: riskSchema.optional(),
  verifyMethod: verifyMethodSchema.optional(),
});
export type RequirementDefinition = z.infer<typeof requirementDefinitionSchema>;

export const requirementRelationshipDefinitionSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  kind: relationshipTypeSchema,
});
export type RequirementRelationshipDefinition = z.infer<
  typeof requirementRelationshipDefinitionSchema
>;

export const requirementDiagramDefinitionSchema = z.object({
  elements: z.array(elementDefinitionSchema).default([]),
  requirements: z.array(requirementDefinitionSchema).default([]),
  relationships: z.array(requirementRelationshipDefinitionSchema).default([]),
});
export type RequirementDiagramDefinition = z.infer<typeof requirementDiagramDefinitionSchema>;
export type RequirementDiagramDefinitionInput = z.input<typeof requirementDiagramDefinitionSchema>;

function buildElement(definition: ElementDefinition): Element {
  const element = new Element(definition.name, definition.kind);
  if (definition.docref !== undefined) element.withDocref(definition.docref);
  return element;
}

function buildRequirement(definition: RequirementDefinition): Requirement {
  const requirement = new Requirement(definition.kind, definition.name, definition.id);
  if (definition.text !== undefined) requirement.withText(definition.text);
  if (definition.risk !== undefined) requirement.withRisk(definition.risk);
  if (definition.verifyMethod !== undefined) requirement.withVerifyMethod(definition.verifyMethod);
  return requirement;
}

export function parseRequirementDiagramDefinition(input: unknown): RequirementDiagramDefinition {
  const parsed = requirementDiagramDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new DefinitionError('requirement diagram definition', parsed.error);
  }
  return parsed.data;
}

/**
 * Build a diagram from a JSON definition. Relationships are added last, so a
 * reference to an undeclared node throws `MissingNodeError`.
 */
export function requirementDiagramFromDefinition(input: unknown): RequirementDiagram {
  const definition = parseRequirementDiagramDefinition(input);
  const diagram = new RequirementDiagram();
  definition.elements.forEach((element) => diagram.addElement(buildElement(element)));
  definition.requirements.forEach((requirement) =>
    diagram.addRequirement(buildRequirement(requirement)),
  );
  definition.relationships.forEach((relationship) =>
    diagram.addRelationship(
      new Relationship(relationship.source, relationship.target, relationship.kind),
    ),
  );
  return diagram;
}
