/**
 * FinOps Audit extension — utilization audit, savings estimates and ranked
 * recommendations over already-fetched cloud resource and billing data.
 */

export { auditAll, type AuditAllOptions } from "./src/engine.js";
export { auditKind, type AuditKindOptions, type KindAuditor } from "./src/auditor.js";
export { aggregate, compareFindings, type AggregateOptions } from "./src/aggregator.js";
export {
  normalizeResource,
  parseMemoryString,
  parseResourceKind,
  zoneToRegion,
  type NormalizeOptions,
  type NormalizeOutcome,
} from "./src/normalizer.js";
export { computeSavings, rightsizingTarget } from "./src/savings.js";
export {
  createEvaluator,
  ruleEvaluators,
  runRules,
  type Rule,
  type RuleEvaluator,
  type RuleHooks,
  type RuleSignal,
} from "./src/rules/index.js";
export {
  auditConfigSchema,
  DEFAULT_AUDIT_CONFIG,
  resolveAuditConfig,
  type AuditConfig,
  type AuditConfigInput,
} from "./src/config.js";
export {
  AuditEngineError,
  AuditErrorCodes,
  AuditTimeoutError,
  ConfigurationError,
  formatErrorMessage,
  InputValidationError,
  InsufficientDataError,
  NormalizationError,
} from "./src/errors.js";
export { rollUpCosts, rollUpServiceCosts, type BillingRow } from "./src/costs.js";
export { loadAuditRequest, parseAuditRequest, type AuditRequest } from "./src/input.js";
export { renderSummary, type RenderOptions } from "./src/report.js";
export { auditConfigTool, auditTool, auditTools } from "./src/tools.js";
export { registerAuditCli } from "./src/cli.js";
export {
  createAuditLogger,
  getAuditLogger,
  MemoryTransport,
  setAuditLogger,
  type AuditLogger,
  type AuditLogLevel,
} from "./src/logger.js";
export * from "./src/types.js";
