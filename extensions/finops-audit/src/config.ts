/**
 * FinOps Audit — Configuration
 *
 * Zod schema for the audit configuration. Validated once, up front; rule and
 * savings code read thresholds from the resolved object and never re-check them.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_STORAGE_CLASS_PRICE_RATIOS: Readonly<Record<string, number>> = {
  STANDARD: 1,
  NEARLINE: 0.5,
  COLDLINE: 0.2,
  ARCHIVE: 0.06,
};

export const DEFAULT_RIGHTSIZING_TIERS = {
  vcpu: [1, 2, 4, 8, 16, 32, 64, 96],
  memory_mb: [128, 256, 512, 1024, 2048, 4096, 8192, 16384, 32768],
};

// =============================================================================
// Schema
// =============================================================================

const ratio = z.number().min(0).max(1);

const tierList = z
  .array(z.number().positive())
  .min(1)
  .refine((tiers) => tiers.every((t, i) => i === 0 || t > tiers[i - 1]), {
    message: "tiers must be strictly ascending",
  });

export const auditConfigSchema = z
  .object({
    idleThreshold: ratio.default(0.1),
    utilizationThreshold: ratio.default(0.8),
    oversizedThreshold: ratio.default(0.2),
    headroomFactor: z.number().min(1).default(1.25),
    storageClassPriceRatios: z
      .record(z.string(), z.number().positive())
      .refine((ratios) => Object.keys(ratios).length > 0, { message: "at least one storage class is required" })
      .default(DEFAULT_STORAGE_CLASS_PRICE_RATIOS),
    committedUseDiscountRate: z.number().min(0).lt(1).default(0),
    /** Omitted means "one worker per kind present". */
    concurrencyLimit: z.number().int().min(1).optional(),
    coldStartRateThreshold: ratio.default(0.05),
    storageAccessThreshold: ratio.default(0.1),
    rightsizingTiers: z
      .object({
        vcpu: tierList.default(DEFAULT_RIGHTSIZING_TIERS.vcpu),
        memory_mb: tierList.default(DEFAULT_RIGHTSIZING_TIERS.memory_mb),
      })
      .strict()
      .default(DEFAULT_RIGHTSIZING_TIERS),
  })
  .strict()
  .refine((cfg) => cfg.oversizedThreshold < cfg.utilizationThreshold, {
    message: "oversizedThreshold must be below utilizationThreshold",
    path: ["oversizedThreshold"],
  });

export type AuditConfig = z.infer<typeof auditConfigSchema>;

/** Caller-facing shape: every field optional. */
export type AuditConfigInput = z.input<typeof auditConfigSchema>;

export const DEFAULT_AUDIT_CONFIG: AuditConfig = auditConfigSchema.parse({});

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validate a configuration object and fill defaults.
 *
 * @throws ConfigurationError listing every offending field.
 */
export function resolveAuditConfig(input?: unknown): AuditConfig {
  const parsed = auditConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}
