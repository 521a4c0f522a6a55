import { createEvaluator, idleRule, reservationRule, sizingRule, type Rule } from "./shared.js";

export const databaseRules: readonly Rule[] = [
  idleRule(
    "connections_avg",
    (connections) => `Averaging ${connections.toFixed(2)} connections; export the data and delete the instance`,
  ),
  sizingRule({ allocation: "vcpu", average: "cpu_avg", peak: "cpu_peak" }, "vCPU"),
  reservationRule(),
];

export const evaluateDatabase = createEvaluator(databaseRules);
