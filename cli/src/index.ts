#!/usr/bin/env node
import { Command } from "commander";
import { registerExtractCommand } from "./commands/extract.js";
import { registerReportCommand } from "./commands/report.js";
import { getLogJson } from "./lib/env.js";
import { logger } from "./lib/logger.js";

type GlobalOptions = {
  quiet?: boolean;
  logJson?: boolean;
  verbose?: boolean;
};

async function main() {
  const program = new Command();

  program
    .name("meeting-notes")
    .description("Extract structured records from plain-text meeting notes")
    .version("0.1.0")
    .option("--quiet", "Only print errors", false)
    .option("--log-json", "Print log lines as JSON (env MEETING_NOTES_LOG_FORMAT=json)", false)
    .option("--verbose", "Print every parse warning", false)
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      logger.setOptions({
        quiet: Boolean(opts.quiet),
        json: Boolean(opts.logJson) || getLogJson(),
        verbose: Boolean(opts.verbose),
      });
    });

  registerExtractCommand(program);
  registerReportCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((e) => { logger.error("[meeting-notes] Unexpected error", e); process.exit(1); });
