import type { Renderable } from '@mermaid-models/shared';

import {
  REQUIREMENT_KEYWORDS,
  RISK_LABELS,
  VERIFY_METHOD_LABELS,
  type RequirementType,
  type Risk,
  type VerifyMethod,
} from './types.js';

export class Requirement implements Renderable {
  public text?: string;
  public risk?: Risk;
  public verifyMethod?: VerifyMethod;

  constructor(
    public readonly kind: RequirementType,
    public readonly name: string,
    public readonly id: string,
  ) {}

  withText(text: string): this {
    this.text = text;
    return this;
  }

  withRisk(risk: Risk): this {
    this.risk = risk;
    return this;
  }

  withVerifyMethod(method: VerifyMethod): this {
    this.verifyMethod = method;
    return this;
  }

  // Optional fields always come out as risk, text, verifymethod.
  render(): string {
    const lines = [`${REQUIREMENT_KEYWORDS[this.kind]} ${this.name} {`, `    id: ${this.id}`];
    if (this.risk !== undefined) {
      lines.push(`    risk: ${RISK_LABELS[this.risk]}`);
    }
    if (this.text !== undefined) {
      lines.push(`    text: "${this.text}"`);
    }
    if (this.verifyMethod !== undefined) {
      lines.push(`    verifymethod: ${VERIFY_METHOD_LABELS[this.verifyMethod]}`);
    }
    lines.push('}');
    return lines.join('\n');
  }
}
