/**
 * Audit Configuration — Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_AUDIT_CONFIG, resolveAuditConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

function issuesOf(input: unknown): string[] {
  try {
    resolveAuditConfig(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe("resolveAuditConfig", () => {
  it("should fill every default", () => {
    expect(resolveAuditConfig()).toEqual({
      idleThreshold: 0.1,
      utilizationThreshold: 0.8,
      oversizedThreshold: 0.2,
      headroomFactor: 1.25,
      storageClassPriceRatios: { STANDARD: 1, NEARLINE: 0.5, COLDLINE: 0.2, ARCHIVE: 0.06 },
      committedUseDiscountRate: 0,
      coldStartRateThreshold: 0.05,
      storageAccessThreshold: 0.1,
      rightsizingTiers: {
        vcpu: [1, 2, 4, 8, 16, 32, 64, 96],
        memory_mb: [128, 256, 512, 1024, 2048, 4096, 8192, 16384, 32768],
      },
    });
    expect(DEFAULT_AUDIT_CONFIG.concurrencyLimit).toBeUndefined();
  });

  it("should keep overrides", () => {
    const config = resolveAuditConfig({ idleThreshold: 0.05, concurrencyLimit: 2, committedUseDiscountRate: 0.3 });
    expect(config.idleThreshold).toBe(0.05);
    expect(config.concurrencyLimit).toBe(2);
    expect(config.committedUseDiscountRate).toBe(0.3);
  });

  it("should reject thresholds outside [0, 1]", () => {
    expect(issuesOf({ idleThreshold: 1.5 })).toEqual(["idleThreshold: Number must be less than or equal to 1"]);
  });

  it("should reject a negative discount rate", () => {
    expect(issuesOf({ committedUseDiscountRate: -0.1 })).toEqual([
      "committedUseDiscountRate: Number must be greater than or equal to 0",
    ]);
  });

  it("should reject unknown options", () => {
    expect(issuesOf({ idleTreshold: 0.2 })).toEqual(["(root): Unrecognized key(s) in object: 'idleTreshold'"]);
  });

  it("should require the oversized bound to sit below the utilization bound", () => {
    expect(issuesOf({ oversizedThreshold: 0.9 })).toEqual([
      "oversizedThreshold: oversizedThreshold must be below utilizationThreshold",
    ]);
  });

  it("should reject unordered rightsizing tiers", () => {
    expect(issuesOf({ rightsizingTiers: { vcpu: [4, 2] } })).toEqual([
      "rightsizingTiers.vcpu: tiers must be strictly ascending",
    ]);
  });

  it("should reject a zero concurrency limit", () => {
    expect(issuesOf({ concurrencyLimit: 0 })).toEqual(["concurrencyLimit: Number must be greater than or equal to 1"]);
  });

  it("should carry a machine-readable code", () => {
    expect(() => resolveAuditConfig({ headroomFactor: 0.5 })).toThrow(ConfigurationError);
    try {
      resolveAuditConfig({ headroomFactor: 0.5 });
    } catch (error) {
      expect(error).toMatchObject({ code: "INVALID_CONFIG" });
    }
  });
});
