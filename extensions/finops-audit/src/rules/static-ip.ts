import { createEvaluator, unusedRule, type Rule } from "./shared.js";

export const staticIpRules: readonly Rule[] = [
  unusedRule("Address is reserved but not attached to anything; release it"),
];

export const evaluateStaticIp = createEvaluator(staticIpRules);
