#!/usr/bin/env node
import { Command } from "commander";
import { registerAuditCli } from "./cli.js";

const program = new Command("finops-audit")
  .description("Cost optimization audit over cloud utilization and billing data")
  .version("0.1.0");

registerAuditCli(program);

await program.parseAsync(process.argv);
