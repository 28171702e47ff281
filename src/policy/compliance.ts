/**
 * Compliance reduction and projection over typed policy records.
 */

import type {
  ComplianceState,
  NonCompliantResource,
  PolicyAssignment,
  PolicyComplianceRecord,
} from "./types.js";

/**
 * Trailing segment of an ARM resource ID (`/subscriptions/.../vaults/kv-1` → `kv-1`).
 */
export function lastPathSegment(id: string): string {
  const segments = id.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? "";
}

/**
 * Worst-case state: any NonCompliant record wins, then any Compliant record;
 * no records (or only unrecognized states) is Unknown.
 */
export function reduceComplianceState(states: readonly string[]): ComplianceState {
  if (states.some((state) => state === "NonCompliant")) return "NonCompliant";
  if (states.some((state) => state === "Compliant")) return "Compliant";
  return "Unknown";
}

/**
 * Attach the reduced state to each assignment, matching records by assignment
 * name.
 */
export function attachComplianceStates(
  assignments: ReadonlyArray<Omit<PolicyAssignment, "complianceState">>,
  records: readonly PolicyComplianceRecord[],
): PolicyAssignment[] {
  const statesByAssignment = new Map<string, string[]>();
  for (const record of records) {
    const states = statesByAssignment.get(record.policyAssignment) ?? [];
    states.push(record.compliance);
    statesByAssignment.set(record.policyAssignment, states);
  }

  return assignments.map((assignment) => ({
    ...assignment,
    complianceState: reduceComplianceState(statesByAssignment.get(assignment.name) ?? []),
  }));
}

export function compliancePrecedence(state: string): number {
  if (state === "NonCompliant") return 0;
  if (state === "Compliant") return 1;
  return 2;
}

/** NonCompliant first, then Compliant, then everything else; stable on ties. */
export function sortByCompliance<T extends { complianceState: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compliancePrecedence(a.complianceState) - compliancePrecedence(b.complianceState));
}

export function selectNonCompliantResources(
  records: readonly PolicyComplianceRecord[],
  assignmentName: string,
): NonCompliantResource[] {
  return records
    .filter((record) => record.policyAssignment === assignmentName && record.compliance === "NonCompliant")
    .map((record) => ({
      resourceName: lastPathSegment(record.resourceId ?? ""),
      resourceType: record.resourceType,
      location: record.location,
    }));
}
