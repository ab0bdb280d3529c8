import { z } from 'zod';

export const cardinalitySchema = z.enum(['ZeroOrOne', 'ExactlyOne', 'ZeroOrMore', 'OneOrMore']);
export type Cardinality = z.infer<typeof cardinalitySchema>;

export type Side = 'left' | 'right';

/** Crow's foot markers, read from the entity outwards on each side of the line. */
export const CARDINALITY_SYMBOLS: Record<Cardinality, Record<Side, string>> = {
  ZeroOrOne: { left: '|o', right: 'o|' },
  ExactlyOne: { left: '||', right: '||' },
  ZeroOrMore: { left: '}o', right: 'o{' },
  OneOrMore: { left: '}|', right: '|{' },
};

export function cardinalitySymbol(cardinality: Cardinality, side: Side): string {
  return CARDINALITY_SYMBOLS[cardinality][side];
}
