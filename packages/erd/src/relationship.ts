import type { Renderable } from '@mermaid-models/shared';

import { cardinalitySymbol, type Cardinality } from './cardinality.js';
import { toEntityId, type EntityId } from './entity.js';

/**
 * A relationship between two entities. Relationships are identifying (solid
 * line) and unlabelled until told otherwise.
 *
 * @example
 * ```ts
 * const albumSongs = new Relationship('ALBUM', 'SONG', 'ExactlyOne', 'ZeroOrMore')
 *   .asNonIdentifying()
 *   .withLabel('has');
 * ```
 */
export class Relationship implements Renderable {
  public readonly leftId: EntityId;
  public readonly rightId: EntityId;
  public isIdentifying = true;
  public label?: string;

  constructor(
    leftId: string,
    rightId: string,
    public readonly leftCardinality: Cardinality,
    public readonly rightCardinality: Cardinality,
  ) {
    this.leftId = toEntityId(leftId);
    this.rightId = toEntityId(rightId);
  }

  /** Render with a dashed line: the child can be identified without the parent. */
  asNonIdentifying(): this {
    this.isIdentifying = false;
    return this;
  }

  withLabel(label: string): this {
    this.label = label;
    return this;
  }

  render(): string {
    const line = this.isIdentifying ? '--' : '..';
    const left = cardinalitySymbol(this.leftCardinality, 'left');
    const right = cardinalitySymbol(this.rightCardinality, 'right');
    let text = `${this.leftId} ${left}${line}${right} ${this.rightId}`;
    if (this.label !== undefined) {
      text += ` : "${this.label}"`;
    }
    return text;
  }
}
