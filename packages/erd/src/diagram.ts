import { renderDocument, type Renderable } from '@mermaid-models/shared';

import { Entity, toEntityId, type EntityId } from './entity.js';
import type { Relationship } from './relationship.js';

export const ERD_HEADER = 'erDiagram';

export class ERD implements Renderable {
  /** Descriptive only; the rendered notation always starts with the header. */
  public title?: string;
  private readonly entityMap = new Map<EntityId, Entity>();
  private readonly relationshipList: Relationship[] = [];

  /** A snapshot of the entities in insertion order. */
  get entities(): ReadonlyMap<EntityId, Entity> {
    return new Map(this.entityMap);
  }

  get relationships(): readonly Relationship[] {
    return Object.freeze([...this.relationshipList]);
  }

  withTitle(title: string): this {
    this.title = title;
    return this;
  }

  /** Insert an entity keyed by its id. An entity with the same id is replaced. */
  addEntity(entity: Entity): void {
    this.entityMap.set(entity.id, entity);
  }

  withEntity(entity: Entity): this {
    this.addEntity(entity);
    return this;
  }

  getEntityById(id: string): Entity | undefined {
    return this.entityMap.get(toEntityId(id));
  }

  createEntityIfMissing(id: string): void {
    if (!this.getEntityById(id)) {
      this.addEntity(new Entity(id));
    }
  }

  /** Append a relationship, creating bare entities for any endpoint not yet in the diagram. */
  addRelationship(relationship: Relationship): void {
    this.createEntityIfMissing(relationship.leftId);
    this.createEntityIfMissing(relationship.rightId);
    this.relationshipList.push(relationship);
  }

  withRelationship(relationship: Relationship): this {
    this.addRelationship(relationship);
    return this;
  }

  render(): string {
    return renderDocument(ERD_HEADER, [
      { title: 'Entities', items: this.entityMap.values() },
      { title: 'Relationships', items: this.relationshipList },
    ]);
  }
}
