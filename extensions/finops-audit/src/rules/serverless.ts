import { createEvaluator, formatPercent, idleRule, requireUtilization, sizingRule, type Rule } from "./shared.js";

/** Cold starts above `coldStartRateThreshold`; severity by multiple of the threshold. */
const coldStartRule: Rule = {
  name: "cold_start",
  evaluate(metric, config) {
    const ratio = requireUtilization(metric, "cold_start_ratio");
    const threshold = config.coldStartRateThreshold;
    if (ratio <= threshold) return undefined;

    const multiple = threshold > 0 ? ratio / threshold : Number.POSITIVE_INFINITY;

    return {
      classification: "cold_start_heavy",
      severity: multiple >= 4 ? "high" : multiple >= 2 ? "medium" : "low",
      evidence: { cold_start_ratio: ratio },
      recommendation: `${formatPercent(ratio)} of requests hit a cold start; set a minimum instance count or trim startup work`,
    };
  },
};

export const serverlessRules: readonly Rule[] = [
  idleRule("request_rate", (rate) => `Serving ${rate.toFixed(3)} requests/s; delete the service or scale it to zero`),
  sizingRule({ allocation: "memory_mb", average: "memory_avg", peak: "memory_peak" }, "MB of memory"),
  coldStartRule,
];

export const evaluateServerless = createEvaluator(serverlessRules);
