/**
 * Azure Policy — Markdown Reporter
 *
 * Renders assignments and exemptions for a CI step summary. Assignment details
 * (definition descriptions, non-compliant resources) are looked up through a
 * {@link PolicyDetailsSource} while rendering.
 */

import { lastPathSegment, sortByCompliance } from "./compliance.js";
import type { NonCompliantResource, PolicyAssignment, PolicyExemption } from "./types.js";

export type PolicyDetailsSource = {
  getPolicyDescription: (policyDefinitionId: string) => Promise<string | undefined>;
  getNonCompliantResources: (resourceGroup: string, assignmentName: string) => Promise<NonCompliantResource[]>;
};

export const NO_ASSIGNMENTS_LINE = "- ℹ️ No policy assignments found for this resource group";
export const NO_EXEMPTIONS_LINE = "- ℹ️ No policy exemptions found for this resource group";
export const REPORT_HEADING = "#### Azure Policy Status";

const DEFAULT_ENFORCEMENT_MODE = "Default";
const DETAIL_INDENT = "    ";

function checkbox(state: string): string {
  if (state === "Compliant") return "✅";
  if (state === "NonCompliant") return "❌";
  return "⚪";
}

export function formatAssignmentHeading(assignment: PolicyAssignment): string {
  let line = `  - ${checkbox(assignment.complianceState)} **${assignment.displayName ?? assignment.name}**`;
  if (assignment.enforcementMode && assignment.enforcementMode !== DEFAULT_ENFORCEMENT_MODE) {
    line += ` (${assignment.enforcementMode})`;
  }
  if (assignment.complianceState !== "Unknown") {
    line += ` - _${assignment.complianceState}_`;
  }
  return line;
}

export function formatNonCompliantResource(resource: NonCompliantResource): string {
  let line = `- **${resource.resourceName}**`;
  if (resource.resourceType) line += ` (${resource.resourceType})`;
  if (resource.location) line += ` - Location: \`${resource.location}\``;
  return line;
}

function indent(text: string): string[] {
  return text.split(/\r?\n/).map((line) => `${DETAIL_INDENT}${line}`);
}

/**
 * Render the assignments section. An empty list renders the single
 * informational line.
 */
export async function renderAssignments(
  assignments: readonly PolicyAssignment[],
  resourceGroup: string,
  details?: PolicyDetailsSource,
): Promise<string> {
  if (assignments.length === 0) return NO_ASSIGNMENTS_LINE;

  const lines = [`**Policy Assignments (${assignments.length}):**`, ""];

  for (const assignment of sortByCompliance(assignments)) {
    lines.push(formatAssignmentHeading(assignment));

    if (details && assignment.policyDefinitionId) {
      const description = await details.getPolicyDescription(assignment.policyDefinitionId);
      if (description) {
        lines.push(
          "",
          `${DETAIL_INDENT}<details>`,
          `${DETAIL_INDENT}<summary><em>Description</em></summary>`,
          "",
          ...indent(description),
          `${DETAIL_INDENT}</details>`,
        );
      }
    }

    if (details && resourceGroup && assignment.complianceState === "NonCompliant") {
      const resources = await details.getNonCompliantResources(resourceGroup, assignment.name);
      if (resources.length > 0) {
        lines.push("", `${DETAIL_INDENT}**Non-compliant resources (${resources.length}):**`);
        for (const resource of resources) {
          lines.push(`${DETAIL_INDENT}${formatNonCompliantResource(resource)}`);
        }
      }
    }

    lines.push("");
  }

  return lines.join("\n");
}

export function formatExemption(exemption: PolicyExemption): string[] {
  let heading = `- 🛡️ **${exemption.displayName ?? exemption.name}**`;
  if (exemption.exemptionCategory) heading += ` - _${exemption.exemptionCategory}_`;

  const lines = [heading];
  if (exemption.expiresOn) lines.push(`  - **Expires:** ${exemption.expiresOn}`);
  if (exemption.description) lines.push(`  - **Reason:** ${exemption.description}`);
  if (exemption.policyAssignmentId) {
    lines.push(`  - **Policy:** \`${lastPathSegment(exemption.policyAssignmentId)}\``);
  }
  return lines;
}

export function renderExemptions(exemptions: readonly PolicyExemption[]): string {
  if (exemptions.length === 0) return NO_EXEMPTIONS_LINE;

  return [`**Policy Exemptions (${exemptions.length}):**`, "", ...exemptions.flatMap(formatExemption)].join("\n");
}

/**
 * Full report: heading, assignments section, exemptions section.
 */
export async function renderPolicyReport(
  assignments: readonly PolicyAssignment[],
  exemptions: readonly PolicyExemption[],
  resourceGroup: string,
  details?: PolicyDetailsSource,
): Promise<string> {
  const assignmentSection = await renderAssignments(assignments, resourceGroup, details);
  return [REPORT_HEADING, "", assignmentSection, "", renderExemptions(exemptions)].join("\n") + "\n";
}
