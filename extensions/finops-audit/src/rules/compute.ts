import { createEvaluator, formatPercent, idleRule, reservationRule, sizingRule, type Rule } from "./shared.js";

export const computeRules: readonly Rule[] = [
  idleRule("cpu_avg", (cpu) => `CPU averages ${formatPercent(cpu)}; stop or delete the instance`),
  sizingRule({ allocation: "vcpu", average: "cpu_avg", peak: "cpu_peak" }, "vCPU"),
  reservationRule(),
];

export const evaluateCompute = createEvaluator(computeRules);
