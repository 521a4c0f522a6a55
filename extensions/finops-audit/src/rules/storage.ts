import { InsufficientDataError } from "../errors.js";
import { createEvaluator, formatPercent, requireAttribute, requireUtilization, unusedRule, type Rule } from "./shared.js";

/**
 * Infrequently read data sitting in the most expensive class. At zero access
 * the target is the cheapest class, otherwise the next cheaper one.
 */
const storageClassRule: Rule = {
  name: "storage_class",
  evaluate(metric, config) {
    const access = requireUtilization(metric, "access_ratio");
    const storageClass = requireAttribute(metric, "storage_class");
    const ratios = config.storageClassPriceRatios;
    const currentRatio = ratios[storageClass];
    if (currentRatio === undefined) throw new InsufficientDataError(metric.resourceId, "storage_class");

    if (access > config.storageAccessThreshold) return undefined;

    const ranked = Object.entries(ratios).sort(([a, ra], [b, rb]) => rb - ra || a.localeCompare(b));
    if (currentRatio < ranked[0][1]) return undefined;

    const cheaper = ranked.filter(([, ratio]) => ratio < currentRatio);
    if (cheaper.length === 0) return undefined;
    const [targetClass, targetRatio] = access === 0 ? cheaper[cheaper.length - 1] : cheaper[0];

    return {
      classification: "storage_class_mismatch",
      severity: access === 0 ? "high" : "medium",
      evidence: {
        access_ratio: access,
        current_price_ratio: currentRatio,
        target_price_ratio: targetRatio,
      },
      recommendation: `Only ${formatPercent(access)} of objects were read; move from ${storageClass} to ${targetClass}`,
      storageTransition: { from: storageClass, to: targetClass },
    };
  },
};

export const storageRules: readonly Rule[] = [
  unusedRule("Disk is not attached to any instance; snapshot it and delete it"),
  storageClassRule,
];

export const evaluateStorage = createEvaluator(storageRules);
