import { MissingNodeError, renderDocument, type Renderable } from '@mermaid-models/shared';

import type { Element } from './element.js';
import type { Relationship } from './relationship.js';
import type { Requirement } from './requirement.js';

export const REQUIREMENT_DIAGRAM_HEADER = 'requirementDiagram';

export class RequirementDiagram implements Renderable {
  private readonly requirementMap = new Map<string, Requirement>();
  private readonly elementMap = new Map<string, Element>();
  private readonly relationshipList: Relationship[] = [];

  get requirements(): ReadonlyMap<string, Requirement> {
    return new Map(this.requirementMap);
  }

  get elements(): ReadonlyMap<string, Element> {
    return new Map(this.elementMap);
  }

  get relationships(): readonly Relationship[] {
    return Object.freeze([...this.relationshipList]);
  }

  addElement(element: Element): void {
    this.elementMap.set(element.name, element);
  }

  withElement(element: Element): this {
    this.addElement(element);
    return this;
  }

  getElementByName(name: string): Element | undefined {
    return this.elementMap.get(name);
  }

  addRequirement(requirement: Requirement): void {
    this.requirementMap.set(requirement.name, requirement);
  }

  withRequirement(requirement: Requirement): this {
    this.addRequirement(requirement);
    return this;
  }

  getRequirementByName(name: string): Requirement | undefined {
    return this.requirementMap.get(name);
  }

  /** Whether an element or a requirement goes by `name`. */
  has(name: string): boolean {
    return this.elementMap.has(name) || this.requirementMap.has(name);
  }

  /**
   * Append a relationship between two nodes already in the diagram.
   *
   * @throws MissingNodeError when the source or the target is unknown; nothing is appended.
   */
  addRelationship(relationship: Relationship): void {
    if (!this.has(relationship.source)) {
      throw new MissingNodeError(relationship.source);
    }
    if (!this.has(relationship.target)) {
      throw new MissingNodeError(relationship.target);
    }
    this.relationshipList.push(relationship);
  }

  withRelationship(relationship: Relationship): this {
    this.addRelationship(relationship);
    return this;
  }

  render(): string {
    return renderDocument(REQUIREMENT_DIAGRAM_HEADER, [
      { title: 'Elements', items: this.elementMap.values() },
      { title: 'Requirements', items: this.requirementMap.values() },
      { title: 'Relationships', items: this.relationshipList },
    ]);
  }
}
