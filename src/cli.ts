#!/usr/bin/env node

import { Command } from "commander";
import { defaultReportDeps, reportOptionsSchema, runReport } from "./commands/report.js";
import { packageVersion } from "./utils/package.js";
import { getPassword } from "./utils/password.js";

const program = new Command();

program
  .name("epic-readiness")
  .description("Readiness and risk report for tracked epics")
  .version(packageVersion());

program
  .command("report")
  .description("Evaluate the epics of a search profile and print a tab-separated sheet")
  .requiredOption("-c, --config <file>", "Configuration file")
  .requiredOption("-p, --profile <id>", "Search profile")
  .requiredOption("-u, --user <name>", "Tracker username")
  .option("--json", "Output one JSON document per epic instead of the sheet")
  .action(async (opts: unknown) => {
    try {
      const options = reportOptionsSchema.parse(opts);
      await runReport(options, defaultReportDeps(() => getPassword()));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error: ${message}`);
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
