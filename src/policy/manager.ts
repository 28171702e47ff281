/**
 * Azure Policy Manager
 *
 * Reads policy assignments, compliance states and exemptions for a resource
 * group through the az CLI. Reads are best-effort: a failed or unparseable
 * query yields an empty list so a CI summary can always be produced.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AzureCLIWrapper } from "../cli/wrapper.js";
import { requireArgs } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { formatErrorMessage } from "../retry.js";
import { attachComplianceStates, lastPathSegment, selectNonCompliantResources } from "./compliance.js";
import { renderPolicyReport, type PolicyDetailsSource } from "./report.js";
import {
  RawAssignmentSchema,
  RawComplianceRecordSchema,
  RawExemptionSchema,
  type NonCompliantResource,
  type PolicyAssignment,
  type PolicyComplianceRecord,
  type PolicyExemption,
} from "./types.js";

const ASSIGNMENT_QUERY =
  "[].{name:name, displayName:displayName, enforcementMode:enforcementMode, policyDefinitionId:policyDefinitionId}";
const STATE_QUERY =
  "[].{policyAssignment:policyAssignmentName, compliance:complianceState, resourceId:resourceId, " +
  "resourceType:resourceType, location:resourceLocation}";
const EXEMPTION_QUERY =
  "[].{name:name, displayName:displayName, policyAssignmentId:policyAssignmentId, " +
  "exemptionCategory:exemptionCategory, expiresOn:expiresOn, description:description}";

export type PolicyManagerOptions = {
  logger?: Logger;
};

/** Keep the array items that match the schema; anything that is not an array is empty. */
export function parseList<T extends TSchema>(schema: T, value: unknown): Array<Static<T>> {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is Static<T> => Value.Check(schema, item));
}

function text(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

export class AzurePolicyManager implements PolicyDetailsSource {
  private cli: AzureCLIWrapper;
  private logger: Logger;

  constructor(cli: AzureCLIWrapper, options?: PolicyManagerOptions) {
    this.cli = cli;
    this.logger = options?.logger ?? silentLogger;
  }

  private async queryList<T extends TSchema>(what: string, args: string[], schema: T): Promise<Array<Static<T>>> {
    try {
      const result = await this.cli.execute(args);
      if (!result.success) {
        this.logger.debug(`Could not read ${what}: ${result.stderr.trim()}`);
        return [];
      }
      return parseList(schema, result.parsed);
    } catch (error) {
      this.logger.debug(`Could not read ${what}: ${formatErrorMessage(error)}`);
      return [];
    }
  }

  async listAssignments(resourceGroup: string): Promise<Array<Omit<PolicyAssignment, "complianceState">>> {
    const raw = await this.queryList(
      "policy assignments",
      ["policy", "assignment", "list", "--resource-group", resourceGroup, "--query", ASSIGNMENT_QUERY],
      RawAssignmentSchema,
    );
    return raw.map((a) => ({
      name: a.name,
      displayName: text(a.displayName),
      enforcementMode: text(a.enforcementMode),
      policyDefinitionId: text(a.policyDefinitionId),
    }));
  }

  async listComplianceRecords(resourceGroup: string): Promise<PolicyComplianceRecord[]> {
    const raw = await this.queryList(
      "policy states",
      ["policy", "state", "list", "--resource-group", resourceGroup, "--query", STATE_QUERY],
      RawComplianceRecordSchema,
    );
    return raw.map((r) => ({
      policyAssignment: r.policyAssignment,
      compliance: r.compliance ?? "",
      resourceId: text(r.resourceId),
      resourceType: text(r.resourceType),
      location: text(r.location),
    }));
  }

  /**
   * Assignments scoped to the resource group, each carrying its worst-case
   * compliance state.
   */
  async getAssignmentsWithCompliance(resourceGroup: string): Promise<PolicyAssignment[]> {
    requireArgs({ resourceGroup });

    const assignments = await this.listAssignments(resourceGroup);
    if (assignments.length === 0) return [];

    const records = await this.listComplianceRecords(resourceGroup);
    return attachComplianceStates(assignments, records);
  }

  async getExemptions(resourceGroup: string): Promise<PolicyExemption[]> {
    requireArgs({ resourceGroup });

    const raw = await this.queryList(
      "policy exemptions",
      ["policy", "exemption", "list", "--resource-group", resourceGroup, "--query", EXEMPTION_QUERY],
      RawExemptionSchema,
    );
    return raw.map((e) => ({
      name: e.name,
      displayName: text(e.displayName),
      exemptionCategory: text(e.exemptionCategory),
      expiresOn: text(e.expiresOn),
      description: text(e.description),
      policyAssignmentId: text(e.policyAssignmentId),
    }));
  }

  async getNonCompliantResources(resourceGroup: string, assignmentName: string): Promise<NonCompliantResource[]> {
    requireArgs({ resourceGroup, assignmentName });

    const records = await this.listComplianceRecords(resourceGroup);
    return selectNonCompliantResources(records, assignmentName);
  }

  /**
   * Description of the policy definition an assignment points at, if it has one.
   */
  async getPolicyDescription(policyDefinitionId: string): Promise<string | undefined> {
    const name = lastPathSegment(policyDefinitionId);
    if (!name) return undefined;

    try {
      const result = await this.cli.executeValue([
        "policy", "definition", "show", "--name", name, "--query", "description",
      ]);
      if (!result.success) {
        this.logger.debug(`Could not read policy definition ${name}: ${result.stderr.trim()}`);
      }
      return result.value || undefined;
    } catch (error) {
      this.logger.debug(`Could not read policy definition ${name}: ${formatErrorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Markdown policy status report for a resource group.
   */
  async generateReport(resourceGroup: string): Promise<string> {
    requireArgs({ resourceGroup });

    const assignments = await this.getAssignmentsWithCompliance(resourceGroup);
    const exemptions = await this.getExemptions(resourceGroup);
    return renderPolicyReport(assignments, exemptions, resourceGroup, this);
  }
}

export function createPolicyManager(cli: AzureCLIWrapper, options?: PolicyManagerOptions): AzurePolicyManager {
  return new AzurePolicyManager(cli, options);
}
