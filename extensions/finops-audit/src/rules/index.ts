import type { ResourceKind } from "../types.js";
import { evaluateCompute } from "./compute.js";
import { evaluateDatabase } from "./database.js";
import { evaluateServerless } from "./serverless.js";
import type { RuleEvaluator } from "./shared.js";
import { evaluateStaticIp } from "./static-ip.js";
import { evaluateStorage } from "./storage.js";

/** One evaluator per kind; adding a kind without rules fails to compile. */
export const ruleEvaluators: { readonly [K in ResourceKind]: RuleEvaluator } = {
  compute: evaluateCompute,
  serverless: evaluateServerless,
  database: evaluateDatabase,
  storage: evaluateStorage,
  static_ip: evaluateStaticIp,
};

export type { Rule, RuleEvaluator, RuleHooks, RuleSignal, SizingBasis, TieredAllocation } from "./shared.js";
export { createEvaluator, runRules } from "./shared.js";
