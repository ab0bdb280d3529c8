import type { Renderable } from '@mermaid-models/shared';

export interface KeyConstraints {
  isPrimary: boolean;
  isForeign: boolean;
  isUnique: boolean;
}

export function emptyKeyConstraints(): KeyConstraints {
  return { isPrimary: false, isForeign: false, isUnique: false };
}

export function hasConstraints(key: KeyConstraints): boolean {
  return key.isPrimary || key.isForeign || key.isUnique;
}

/** `PK`, `FK` and `UK` in that order, joined with `, `; empty when no flag is set. */
export function formatKeyConstraints(key: KeyConstraints): string {
  const parts: string[] = [];
  if (key.isPrimary) parts.push('PK');
  if (key.isForeign) parts.push('FK');
  if (key.isUnique) parts.push('UK');
  return parts.join(', ');
}

export class Attribute implements Renderable {
  public readonly key: KeyConstraints = emptyKeyConstraints();
  public comment?: string;

  constructor(
    public readonly type: string,
    public readonly name: string,
  ) {}

  withComment(comment: string): this {
    this.comment = comment;
    return this;
  }

  asPrimaryKey(): this {
    this.key.isPrimary = true;
    return this;
  }

  asForeignKey(): this {
    this.key.isForeign = true;
    return this;
  }

  asUnique(): this {
    this.key.isUnique = true;
    return this;
  }

  hasConstraints(): boolean {
    return hasConstraints(this.key);
  }

  render(): string {
    let text = `${this.type} ${this.name}`;
    if (this.hasConstraints()) {
      text += ` ${formatKeyConstraints(this.key)}`;
    }
    if (this.comment !== undefined) {
      text += ` "${this.comment}"`;
    }
    return text;
  }
}
