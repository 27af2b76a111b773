#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { writeExcelReport } from "./render/excel.js";
import { writeHtmlReport } from "./render/html.js";
import { renderTerminalReport } from "./render/terminal.js";
import { assertHasHosts, prepareReport, selectTables } from "./report.js";
import type { TableFlags } from "./report.js";
import { startMcpServer, VERSION } from "./serve.js";

interface ReportCommandOptions extends TableFlags {
  input: string;
  output: string;
  html?: boolean;
  excel?: boolean;
  verbose?: boolean;
  debug?: boolean;
  config?: string;
}

let debug = false;

const program = new Command();

program
  .name("scan-fusion")
  .description("Fuse nmap XML, greppable and normal output into one report per host")
  .version(VERSION);

// ── report ──
program
  .command("report", { isDefault: true })
  .description("Fuse scan files and print (and optionally export) the report")
  .requiredOption("-i, --input <path>", "Scan file or directory")
  .option("-o, --output <dir>", "Directory for HTML and Excel reports", "./output")
  .option("-1, --table1", "Host summary")
  .option("-2, --table2", "Host details")
  .option("-3, --table3", "Port frequency")
  .option("-4, --table4", "Service exposure")
  .option("-a, --all", "All tables (default when none is selected)")
  .option("--html", "Write an HTML report")
  .option("--excel", "Write an Excel workbook")
  .option("-v, --verbose", "Include fusion statistics, CVEs and weak ciphers")
  .option("-d, --debug", "Debug logging and stack traces")
  .option("--config <file>", "JSON config file")
  .action(async (opts: ReportCommandOptions) => {
    if (opts.debug) {
      debug = true;
      setLogLevel("debug");
    }

    const config = await loadConfig(opts.config);
    const context = await prepareReport(opts.input, selectTables(opts), config);
    assertHasHosts(context, opts.input);

    process.stdout.write(
      renderTerminalReport(context.analysis, context.summary, context.tables, context.commands, {
        verbose: opts.verbose,
      })
    );

    if (opts.html) {
      const file = await writeHtmlReport(context, opts.output, { verbose: opts.verbose });
      console.log(`HTML report: ${file}`);
    }
    if (opts.excel) {
      const file = await writeExcelReport(context, opts.output);
      console.log(`Excel report: ${file}`);
    }
  });

// ── serve ──
program
  .command("serve")
  .description("Start the MCP server (stdio transport)")
  .action(async () => {
    await startMcpServer();
  });

program.parseAsync().catch((err: unknown) => {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error(`Error: ${error.message}`);
  if (debug && error.stack) {
    console.error(error.stack);
  }
  logger.debug({ err: error }, "command failed");
  process.exit(1);
});
