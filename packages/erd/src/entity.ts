import { indent, type Renderable } from '@mermaid-models/shared';
import { z } from 'zod';

import type { Attribute } from './attribute.js';

/** Entity ids are compared and rendered in upper case. */
export const entityIdSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .brand<'EntityId'>();
export type EntityId = z.infer<typeof entityIdSchema>;

export function toEntityId(value: string): EntityId {
  return entityIdSchema.parse(value);
}

export class Entity implements Renderable {
  public readonly id: EntityId;
  public alias?: string;
  public readonly attributes: Attribute[] = [];

  constructor(id: string) {
    this.id = toEntityId(id);
  }

  withAlias(alias: string): this {
    this.alias = alias;
    return this;
  }

  withAttribute(attribute: Attribute): this {
    this.attributes.push(attribute);
    return this;
  }

  render(): string {
    let text: string = this.id;
    if (this.alias !== undefined) {
      text += `["${this.alias}"]`;
    }
    if (this.attributes.length > 0) {
      const body = this.attributes.map((attribute) => attribute.render()).join('\n');
      text += ` {\n${indent(body, 4)}\n}`;
    }
    return text;
  }
}
