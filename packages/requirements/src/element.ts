import type { Renderable } from '@mermaid-models/shared';

/** Something outside the requirement set that requirements trace to, such as a document. */
export class Element implements Renderable {
  public docref?: string;

  constructor(
    public readonly name: string,
    public readonly kind: string,
  ) {}

  withDocref(docref: string): this {
    this.docref = docref;
    return this;
  }

  render(): string {
    let text = `element ${this.name} {\n`;
    text += `    type: "${this.kind}"\n`;
    if (this.docref !== undefined) {
      text += `    docref: ${this.docref}\n`;
    }
    return `${text}}`;
  }
}
