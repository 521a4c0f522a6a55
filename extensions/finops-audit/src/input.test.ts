/**
 * Audit Request Documents — Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { InputValidationError } from "./errors.js";
import { loadAuditRequest, parseAuditRequest } from "./input.js";

describe("parseAuditRequest", () => {
  it("should group resources by kind, accepting aliases", () => {
    const request = parseAuditRequest({
      resources: {
        compute: [{ resourceId: "vm-1", region: "us-central1" }],
        cloud_run: [{ resourceId: "run-1", region: "us-central1" }],
        cloud_function: [{ resourceId: "fn-1", region: "us-central1" }],
      },
    });
    expect(Object.keys(request.resourcesByKind)).toEqual(["compute", "serverless"]);
    expect(request.resourcesByKind.serverless?.map((r) => r.resourceId)).toEqual(["run-1", "fn-1"]);
    expect(request.costByResource).toEqual({});
    expect(request.costByService).toEqual({});
    expect(request.config).toEqual({});
  });

  it("should merge billing roll-ups with explicit costs, explicit winning", () => {
    const request = parseAuditRequest({
      resources: {},
      billing: [
        { resourceId: "vm-1", cost: 40 },
        { resourceId: "vm-2", cost: 10 },
      ],
      costs: { "vm-2": 25 },
    });
    expect(request.costByResource).toEqual({ "vm-1": 40, "vm-2": 25 });
  });

  it("should break billing down by service", () => {
    const request = parseAuditRequest({
      resources: {},
      billing: [
        { resourceId: "bucket-1", service: "Cloud Storage", cost: 5 },
        { resourceId: "vm-1", service: "Compute Engine", cost: 40 },
        { resourceId: null, service: "Support", cost: 100 },
      ],
    });
    expect(Object.entries(request.costByService)).toEqual([
      ["Support", 100],
      ["Compute Engine", 40],
      ["Cloud Storage", 5],
    ]);
    expect(request.costByResource).toEqual({ "bucket-1": 5, "vm-1": 40 });
  });

  it("should reject unknown resource kinds", () => {
    expect(() => parseAuditRequest({ resources: { mainframe: [] } })).toThrow(
      new InputValidationError(["resources.mainframe: unknown resource kind"]),
    );
  });

  it("should reject malformed documents with field paths", () => {
    try {
      parseAuditRequest({ resources: { compute: [{ resourceId: 7 }] }, costs: { "vm-1": -3 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InputValidationError);
      if (!(error instanceof InputValidationError)) return;
      expect(error.issues).toEqual([
        "resources.compute.0.resourceId: Expected string, received number",
        "costs.vm-1: Number must be greater than or equal to 0",
      ]);
    }
  });
});

describe("loadAuditRequest", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "finops-audit-input-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should read a request from disk", async () => {
    const file = join(dir, "request.json");
    await writeFile(file, JSON.stringify({ resources: { static_ip: [{ resourceId: "ip-1", region: "us-east1" }] } }));
    const request = await loadAuditRequest(file);
    expect(request.resourcesByKind.static_ip).toHaveLength(1);
  });

  it("should report invalid JSON as an input error", async () => {
    const file = join(dir, "broken.json");
    await writeFile(file, "{ not json");
    await expect(loadAuditRequest(file)).rejects.toBeInstanceOf(InputValidationError);
  });

  it("should report a missing file as an input error", async () => {
    await expect(loadAuditRequest(join(dir, "absent.json"))).rejects.toBeInstanceOf(InputValidationError);
  });
});
