/**
 * FinOps audit agent tools — run an audit over an in-memory request and show
 * the effective configuration.
 */

import { Type } from "@sinclair/typebox";
import { resolveAuditConfig } from "./config.js";
import { auditAll } from "./engine.js";
import { formatErrorMessage } from "./errors.js";
import { parseAuditRequest } from "./input.js";
import type { AuditLogger } from "./logger.js";
import { renderSummary } from "./report.js";

export type ToolContext = {
  logger?: AuditLogger;
  now?: () => Date;
};

export type ToolResult = { content: Array<{ type: "text"; text: string }> };

function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

export const auditTool = {
  name: "finops_audit",
  description:
    "Audit cloud resources for cost optimization. Provide resources grouped by kind (compute, serverless, database, storage, static_ip) with utilization samples and per-resource monthly costs. Returns ranked findings with estimated monthly savings.",
  inputSchema: Type.Object({
    request: Type.Object(
      {
        resources: Type.Record(Type.String(), Type.Array(Type.Record(Type.String(), Type.Unknown()))),
        costs: Type.Optional(Type.Record(Type.String(), Type.Number())),
        billing: Type.Optional(Type.Array(Type.Record(Type.String(), Type.Unknown()))),
        config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
      },
      { description: "Audit request document" },
    ),
    deadlineMs: Type.Optional(Type.Number({ description: "Per-run deadline in milliseconds" })),
    format: Type.Optional(
      Type.Union([Type.Literal("summary"), Type.Literal("json")], {
        description: "Output format: summary or json. Default: summary",
      }),
    ),
    limit: Type.Optional(Type.Integer({ minimum: 0, description: "Maximum findings listed in summary output" })),
  }),
  execute: async (
    input: { request: unknown; deadlineMs?: number; format?: "summary" | "json"; limit?: number },
    context: ToolContext = {},
  ): Promise<ToolResult> => {
    try {
      const request = parseAuditRequest(input.request);
      const summary = await auditAll(request.resourcesByKind, request.costByResource, request.config, {
        deadlineMs: input.deadlineMs,
        logger: context.logger,
        now: context.now,
      });
      return textResult(
        input.format === "json"
          ? JSON.stringify({ ...summary, serviceCosts: request.costByService }, null, 2)
          : renderSummary(summary, { limit: input.limit, serviceCosts: request.costByService }),
      );
    } catch (error) {
      return textResult(`Audit failed: ${formatErrorMessage(error)}`);
    }
  },
};

export const auditConfigTool = {
  name: "finops_audit_config",
  description:
    "Show the effective audit thresholds. Optionally pass overrides to validate them against the configuration schema.",
  inputSchema: Type.Object({
    overrides: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
  execute: async (input: { overrides?: Record<string, unknown> }): Promise<ToolResult> => {
    try {
      return textResult(JSON.stringify(resolveAuditConfig(input.overrides), null, 2));
    } catch (error) {
      return textResult(`Invalid configuration: ${formatErrorMessage(error)}`);
    }
  },
};

export const auditTools = [auditTool, auditConfigTool];
