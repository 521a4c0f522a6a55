/**
 * Plain-text rendering of a summary, shared by the CLI and the agent tools.
 */

import { RESOURCE_KINDS, type CostByService, type DashboardAuditSummary, type Finding } from "./types.js";

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function findingLine(finding: Finding): string {
  return (
    `- [${finding.severity.toUpperCase()}] ${finding.resourceId} (${finding.kind}, ${finding.region}) ` +
    `${finding.classification}: ${formatUsd(finding.potentialMonthlySavings)}/mo. ${finding.recommendation}`
  );
}

export type RenderOptions = {
  /** Maximum findings listed; negative values list none. */
  limit?: number;
  /** Billed cost per service, listed when non-empty. */
  serviceCosts?: CostByService;
};

export function renderSummary(summary: DashboardAuditSummary, options: RenderOptions = {}): string {
  const lines: string[] = ["## FinOps Audit"];
  lines.push(`Generated: ${summary.generatedAt}`);
  lines.push(`Potential savings: ${formatUsd(summary.totalPotentialMonthlySavings)}/mo`);
  lines.push(`Findings: ${summary.allFindings.length}${summary.degraded ? " (degraded: some resources failed)" : ""}`);

  lines.push("", "### By kind");
  for (const kind of RESOURCE_KINDS) {
    const result = summary.byKind[kind];
    if (!result) continue;
    lines.push(
      `- ${kind}: ${result.totalCount} resources, ${result.findings.length} findings, ` +
        `${formatUsd(result.potentialMonthlySavings)}/mo, ${result.errors.length} errors`,
    );
  }

  const services = Object.entries(options.serviceCosts ?? {});
  if (services.length > 0) {
    lines.push("", "### Cost by service");
    lines.push(...services.map(([service, cost]) => `- ${service}: ${formatUsd(cost)}`));
  }

  const shown =
    options.limit !== undefined ? summary.allFindings.slice(0, Math.max(0, options.limit)) : summary.allFindings;
  if (shown.length > 0) {
    lines.push("", "### Recommendations");
    lines.push(...shown.map(findingLine));
    if (shown.length < summary.allFindings.length) {
      lines.push(`… ${summary.allFindings.length - shown.length} more`);
    }
  }

  const errors = RESOURCE_KINDS.flatMap((kind) =>
    (summary.byKind[kind]?.errors ?? []).map((e) => `- ${kind}${e.resourceId ? `/${e.resourceId}` : ""}: ${e.reason}`),
  );
  if (errors.length > 0) {
    lines.push("", "### Errors", ...errors);
  }

  return lines.join("\n");
}
