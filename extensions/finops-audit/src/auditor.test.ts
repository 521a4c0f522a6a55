/**
 * Per-kind Auditor — Tests
 */

import { describe, it, expect } from "vitest";
import { auditKind } from "./auditor.js";
import { DEFAULT_AUDIT_CONFIG } from "./config.js";
import { createAuditLogger, MemoryTransport } from "./logger.js";
import type { RuleEvaluator } from "./rules/index.js";
import type { RawResource } from "./types.js";

function vm(id: string | undefined, cpu: number, extra: Partial<RawResource> = {}): RawResource {
  return { resourceId: id, region: "us-central1", samples: { cpu_avg: cpu, vcpu: 4 }, ...extra };
}

function setup() {
  const memory = new MemoryTransport();
  const logger = createAuditLogger("test", { level: "debug", transports: [memory] });
  return { memory, logger };
}

describe("auditKind", () => {
  it("should report an idle instance with its full cost as savings", async () => {
    const { logger } = setup();
    const result = await auditKind("compute", [vm("vm-a", 0.02)], { "vm-a": 200 }, DEFAULT_AUDIT_CONFIG, { logger });

    expect(result.totalCount).toBe(1);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      resourceId: "vm-a",
      kind: "compute",
      region: "us-central1",
      classification: "idle",
      potentialMonthlySavings: 200,
    });
    expect(result.potentialMonthlySavings).toBe(200);
    expect(result.idleCount).toBe(1);
  });

  it("should isolate a malformed resource from the rest of the batch", async () => {
    const { logger, memory } = setup();
    const resources = [vm("vm-a", 0.02), vm(undefined, 0.02), vm("vm-c", 0.01)];
    const result = await auditKind("compute", resources, {}, DEFAULT_AUDIT_CONFIG, { logger });

    expect(result.totalCount).toBe(3);
    expect(result.errors).toEqual([
      { resourceId: undefined, reason: "Resource <unknown> is missing required fields: resourceId" },
    ]);
    expect(result.findings.map((f) => f.resourceId)).toEqual(["vm-a", "vm-c"]);
    expect(memory.messages("warn")).toEqual(["Skipping resource that failed normalization"]);
  });

  it("should audit a resource with a very long utilization series", async () => {
    const { logger } = setup();
    const resources: RawResource[] = [
      vm("vm-ok", 0.02),
      { resourceId: "vm-long", region: "us-central1", series: { cpu_utilization: new Array<number>(500_000).fill(0.5) } },
    ];
    const result = await auditKind("compute", resources, { "vm-ok": 10 }, DEFAULT_AUDIT_CONFIG, { logger });

    expect(result.totalCount).toBe(2);
    expect(result.errors).toEqual([]);
    expect(result.findings.map((f) => [f.resourceId, f.classification, f.potentialMonthlySavings])).toEqual([
      ["vm-ok", "idle", 10],
    ]);
  });

  it("should record a resource whose normalization throws and keep going", async () => {
    const { logger, memory } = setup();
    const broken: RawResource = {
      resourceId: "vm-bad",
      region: "us-central1",
      get samples(): Record<string, number> {
        throw new Error("samples unavailable");
      },
    };
    const result = await auditKind("compute", [broken, vm("vm-ok", 0.02)], { "vm-ok": 10 }, DEFAULT_AUDIT_CONFIG, {
      logger,
    });

    expect(result.totalCount).toBe(2);
    expect(result.errors).toEqual([{ resourceId: "vm-bad", reason: "samples unavailable" }]);
    expect(result.findings.map((f) => f.resourceId)).toEqual(["vm-ok"]);
    expect(memory.messages("warn")).toEqual(["Normalization failed"]);
  });

  it("should record an unexpected rule failure and keep going", async () => {
    const { logger } = setup();
    const evaluator: RuleEvaluator = (metric) => {
      if (metric.resourceId === "vm-b") throw new Error("boom");
      return [{ classification: "unused", severity: "medium", evidence: {}, recommendation: "release" }];
    };
    const result = await auditKind("compute", [vm("vm-a", 0.5), vm("vm-b", 0.5)], { "vm-a": 10, "vm-b": 10 }, DEFAULT_AUDIT_CONFIG, {
      logger,
      evaluator,
    });

    expect(result.totalCount).toBe(2);
    expect(result.errors).toEqual([{ resourceId: "vm-b", reason: "boom" }]);
    expect(result.findings.map((f) => [f.resourceId, f.potentialMonthlySavings])).toEqual([["vm-a", 10]]);
  });

  it("should log skipped rules at debug", async () => {
    const { logger, memory } = setup();
    await auditKind("static_ip", [{ resourceId: "ip-1", region: "us-east1" }], {}, DEFAULT_AUDIT_CONFIG, { logger });

    const skip = memory.entries.find((e) => e.message === "Rule unused skipped");
    expect(skip?.level).toBe("debug");
    expect(skip?.resourceId).toBe("ip-1");
    expect(skip?.subsystem).toBe("finops-audit/test/auditor/static_ip");
    expect(skip?.metadata).toEqual({ metric: "attachment_count" });
  });

  it("should count untagged, idle and oversized resources", async () => {
    const { logger } = setup();
    const resources = [
      vm("vm-a", 0.02, { labels: { team: "web" } }),
      vm("vm-b", 0.15),
      vm("vm-c", 0.5),
    ];
    const result = await auditKind("compute", resources, {}, DEFAULT_AUDIT_CONFIG, { logger });

    expect(result.untaggedCount).toBe(2);
    expect(result.idleCount).toBe(1);
    expect(result.oversizedCount).toBe(1);
  });

  it("should audit a resource under the kind of the list it arrived in", async () => {
    const { logger } = setup();
    const result = await auditKind("compute", [vm("db-1", 0.02, { kind: "cloud_sql" })], {}, DEFAULT_AUDIT_CONFIG, { logger });
    expect(result.findings[0].kind).toBe("compute");
  });

  it("should return a frozen result", async () => {
    const { logger } = setup();
    const result = await auditKind("compute", [vm("vm-a", 0.02)], {}, DEFAULT_AUDIT_CONFIG, { logger });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.findings)).toBe(true);
    expect(Object.isFrozen(result.findings[0].evidence)).toBe(true);
  });

  it("should stop when its signal is aborted", async () => {
    const { logger } = setup();
    const controller = new AbortController();
    controller.abort();
    await expect(
      auditKind("compute", [vm("vm-a", 0.02)], {}, DEFAULT_AUDIT_CONFIG, { logger, signal: controller.signal }),
    ).rejects.toThrow();
  });
});
