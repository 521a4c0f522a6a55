/**
 * Audit request documents: the JSON shape accepted by the CLI and the agent
 * tools. Validated with zod, then mapped onto the engine's inputs.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { rollUpCosts, rollUpServiceCosts } from "./costs.js";
import { InputValidationError } from "./errors.js";
import { parseResourceKind } from "./normalizer.js";
import type { CostByResource, CostByService, RawResource, ResourceKind, ResourcesByKind } from "./types.js";

const rawResourceSchema = z.object({
  resourceId: z.string().optional(),
  kind: z.string().optional(),
  region: z.string().optional(),
  zone: z.string().optional(),
  labels: z.record(z.string(), z.string()).optional(),
  samples: z.record(z.string(), z.number().nullable()).optional(),
  series: z.record(z.string(), z.array(z.number())).optional(),
  attributes: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

const billingRowSchema = z.object({
  resourceId: z.string().nullable().optional(),
  service: z.string().optional(),
  cost: z.number(),
  credits: z.number().optional(),
});

export const auditRequestSchema = z
  .object({
    resources: z.record(z.string(), z.array(rawResourceSchema)),
    costs: z.record(z.string(), z.number().nonnegative()).optional(),
    billing: z.array(billingRowSchema).optional(),
    /** Validated later by resolveAuditConfig. */
    config: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export type AuditRequestDocument = z.infer<typeof auditRequestSchema>;

export type AuditRequest = {
  resourcesByKind: ResourcesByKind;
  costByResource: CostByResource;
  /** Empty when the document carries no billing rows. */
  costByService: CostByService;
  config: Record<string, unknown>;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a request document. Resource list keys may be kind names or
 * provider aliases (`cloud_run`, `bucket`, …); lists for the same kind merge.
 * Explicit `costs` override amounts rolled up from `billing`.
 *
 * @throws InputValidationError
 */
export function parseAuditRequest(input: unknown): AuditRequest {
  const parsed = auditRequestSchema.safeParse(input);
  if (!parsed.success) throw new InputValidationError(formatIssues(parsed.error));

  const document = parsed.data;
  const resourcesByKind: Partial<Record<ResourceKind, RawResource[]>> = {};
  const issues: string[] = [];

  for (const [key, resources] of Object.entries(document.resources)) {
    const kind = parseResourceKind(key);
    if (!kind) {
      issues.push(`resources.${key}: unknown resource kind`);
      continue;
    }
    resourcesByKind[kind] = [...(resourcesByKind[kind] ?? []), ...resources];
  }
  if (issues.length > 0) throw new InputValidationError(issues);

  return {
    resourcesByKind,
    costByResource: { ...rollUpCosts(document.billing ?? []), ...document.costs },
    costByService: rollUpServiceCosts(document.billing ?? []),
    config: document.config ?? {},
  };
}

/** Read and validate a request document from a JSON file. */
export async function loadAuditRequest(path: string): Promise<AuditRequest> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new InputValidationError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new InputValidationError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  return parseAuditRequest(json);
}
