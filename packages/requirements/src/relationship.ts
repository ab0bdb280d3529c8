import type { Renderable } from '@mermaid-models/shared';

import { RELATIONSHIP_KEYWORDS, type RelationshipType } from './types.js';

export class Relationship implements Renderable {
  constructor(
    public readonly source: string,
    public readonly target: string,
    public readonly kind: RelationshipType,
  ) {}

  render(): string {
    return `${this.source} - ${RELATIONSHIP_KEYWORDS[this.kind]} -> ${this.target}`;
  }
}
