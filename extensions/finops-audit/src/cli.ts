/**
 * FinOps audit CLI commands.
 */

import { InvalidArgumentError, type Command } from "commander";
import { resolveAuditConfig } from "./config.js";
import { auditAll } from "./engine.js";
import { ConfigurationError, formatErrorMessage, InputValidationError } from "./errors.js";
import { loadAuditRequest } from "./input.js";
import { getAuditLogger, isAuditLogLevel, type AuditLogger } from "./logger.js";
import { parseResourceKind } from "./normalizer.js";
import { renderSummary } from "./report.js";
import type { ResourceKind, ResourcesByKind } from "./types.js";

export const LOG_LEVEL_ENV = "FINOPS_AUDIT_LOG_LEVEL";

export type CliIO = {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  logger?: AuditLogger;
  now?: () => Date;
  env?: Record<string, string | undefined>;
  setExitCode?: (code: number) => void;
};

type AuditCommandOptions = {
  json?: boolean;
  deadline?: number;
  concurrency?: number;
  limit?: number;
  logLevel?: string;
  kind?: ResourceKind;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
  }
  return parsed;
}

function parseKind(value: string): ResourceKind {
  const kind = parseResourceKind(value);
  if (!kind) throw new InvalidArgumentError(`Unknown resource kind "${value}".`);
  return kind;
}

function onlyKind(resourcesByKind: ResourcesByKind, kind: ResourceKind | undefined): ResourcesByKind {
  if (kind === undefined) return resourcesByKind;
  const selected: ResourcesByKind = {};
  const resources = resourcesByKind[kind];
  if (resources) selected[kind] = resources;
  return selected;
}

export function registerAuditCli(program: Command, io: CliIO = {}): void {
  const stdout = io.stdout ?? ((text: string) => console.log(text));
  const stderr = io.stderr ?? ((text: string) => console.error(text));
  const env = io.env ?? process.env;
  const setExitCode =
    io.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const fail = (error: unknown) => {
    if (error instanceof ConfigurationError || error instanceof InputValidationError) {
      stderr(error instanceof ConfigurationError ? "Invalid configuration:" : "Invalid audit request:");
      for (const issue of error.issues) stderr(`  - ${issue}`);
    } else {
      stderr(formatErrorMessage(error));
    }
    setExitCode(1);
  };

  program
    .command("audit")
    .description("Audit resources from a JSON request document and rank savings opportunities")
    .argument("<file>", "Path to the audit request JSON")
    .option("--json", "Print the full summary as JSON")
    .option("--deadline <ms>", "Stop waiting for unfinished kinds after this many milliseconds", parseInteger)
    .option("--concurrency <n>", "Maximum kinds audited at once", parseInteger)
    .option("--limit <n>", "Maximum findings listed in table output", parseInteger)
    .option("--kind <kind>", "Audit only this resource kind (kind name or alias)", parseKind)
    .option("--log-level <level>", `Log level (debug|info|warn|error); also ${LOG_LEVEL_ENV}`)
    .action(async (file: string, opts: AuditCommandOptions) => {
      const level = opts.logLevel ?? env[LOG_LEVEL_ENV];
      if (level !== undefined && !isAuditLogLevel(level)) {
        stderr(`Unknown log level "${level}"`);
        setExitCode(1);
        return;
      }

      const logger = io.logger ?? getAuditLogger();
      if (level !== undefined) logger.setLevel(level);

      try {
        const request = await loadAuditRequest(file);
        const config = {
          ...request.config,
          ...(opts.concurrency !== undefined ? { concurrencyLimit: opts.concurrency } : {}),
        };
        const summary = await auditAll(onlyKind(request.resourcesByKind, opts.kind), request.costByResource, config, {
          deadlineMs: opts.deadline,
          logger,
          now: io.now,
        });
        const serviceCosts = request.costByService;
        stdout(
          opts.json
            ? JSON.stringify({ ...summary, serviceCosts }, null, 2)
            : renderSummary(summary, { limit: opts.limit, serviceCosts }),
        );
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("config")
    .description("Print the effective audit configuration defaults")
    .action(() => {
      try {
        stdout(JSON.stringify(resolveAuditConfig(), null, 2));
      } catch (error) {
        fail(error);
      }
    });
}
