/**
 * Azure Policy — Type Definitions
 *
 * Typed shapes of the policy data the reporter works with, plus the TypeBox
 * schemas that az CLI output is checked against before it becomes one of them.
 */

import { Type, type Static } from "@sinclair/typebox";

export type ComplianceState = "Compliant" | "NonCompliant" | "Unknown";

export type PolicyAssignment = {
  name: string;
  displayName?: string;
  enforcementMode?: string;
  policyDefinitionId?: string;
  complianceState: ComplianceState;
};

/** One compliance evaluation of one resource against one assignment. */
export type PolicyComplianceRecord = {
  policyAssignment: string;
  /** `Compliant`, `NonCompliant`, or whatever else the service reports. */
  compliance: string;
  resourceId?: string;
  resourceType?: string;
  location?: string;
};

export type PolicyExemption = {
  name: string;
  displayName?: string;
  exemptionCategory?: string;
  expiresOn?: string;
  description?: string;
  policyAssignmentId?: string;
};

export type NonCompliantResource = {
  resourceName: string;
  resourceType?: string;
  location?: string;
};

// =============================================================================
// Raw CLI shapes
// =============================================================================

// az prints null for unset properties
const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const RawAssignmentSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  displayName: OptionalText,
  enforcementMode: OptionalText,
  policyDefinitionId: OptionalText,
});

export const RawComplianceRecordSchema = Type.Object({
  policyAssignment: Type.String(),
  compliance: OptionalText,
  resourceId: OptionalText,
  resourceType: OptionalText,
  location: OptionalText,
});

export const RawExemptionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  displayName: OptionalText,
  exemptionCategory: OptionalText,
  expiresOn: OptionalText,
  description: OptionalText,
  policyAssignmentId: OptionalText,
});

export type RawAssignment = Static<typeof RawAssignmentSchema>;
export type RawComplianceRecord = Static<typeof RawComplianceRecordSchema>;
export type RawExemption = Static<typeof RawExemptionSchema>;
