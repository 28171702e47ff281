export { AzurePolicyManager, createPolicyManager, parseList } from "./manager.js";
export type { PolicyManagerOptions } from "./manager.js";
export {
  attachComplianceStates,
  compliancePrecedence,
  lastPathSegment,
  reduceComplianceState,
  selectNonCompliantResources,
  sortByCompliance,
} from "./compliance.js";
export {
  renderAssignments,
  renderExemptions,
  renderPolicyReport,
  formatAssignmentHeading,
  formatExemption,
  formatNonCompliantResource,
  NO_ASSIGNMENTS_LINE,
  NO_EXEMPTIONS_LINE,
  REPORT_HEADING,
} from "./report.js";
export type { PolicyDetailsSource } from "./report.js";
export type {
  ComplianceState,
  PolicyAssignment,
  PolicyComplianceRecord,
  PolicyExemption,
  NonCompliantResource,
} from "./types.js";
