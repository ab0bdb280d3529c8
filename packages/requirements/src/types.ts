import { z } from 'zod';

export const requirementTypeSchema = z.enum([
  'Default',
  'Functional',
  'Interface',
  'Performance',
  'Physical',
  'DesignConstraint',
]);
export type RequirementType = z.infer<typeof requirementTypeSchema>;

export const REQUIREMENT_KEYWORDS: Record<RequirementType, string> = {
  Default: 'requirement',
  Functional: 'functionalRequirement',
  Interface: 'interfaceRequirement',
  Performance: 'performanceRequirement',
  Physical: 'physicalRequirement',
  DesignConstraint: 'designConstraint',
};

export const riskSchema = z.enum(['Low', 'Medium', 'High']);
export type Risk = z.infer<typeof riskSchema>;

export const RISK_LABELS: Record<Risk, string> = {
  Low: 'Low',
  Medium: 'Medium',
  High: 'High',
};

export const verifyMethodSchema = z.enum(['Analysis', 'Inspection', 'Test', 'Demo']);
export type VerifyMethod = z.infer<typeof verifyMethodSchema>;

export const VERIFY_METHOD_LABELS: Record<VerifyMethod, string> = {
  Analysis: 'Analysis',
  Inspection: 'Inspection',
  Test: 'Test',
  Demo: 'Demonstration',
};

export const relationshipTypeSchema = z.enum([
  'Contains',
  'Copies',
  'Derives',
  'Satisfies',
  'Verifies',
  'Refines',
  'Traces',
]);
export type RelationshipType = z.infer<typeof relationshipTypeSchema>;

export const RELATIONSHIP_KEYWORDS: Record<RelationshipType, string> = {
  Contains: 'contains',
  Copies: 'copies',
  Derives: 'derives',
  Satisfies: 'satisfies',
  Verifies: 'verifies',
  Refines: 'refines',
  Traces: 'traces',
};
