import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadConfig } from "../config.js";
import { getSupportedFormats, isScanFormat, parseFile } from "../parsers/index.js";
import { fuseInput } from "../pipeline.js";
import { renderTerminalReport } from "../render/terminal.js";
import { prepareReport } from "../report.js";
import { TABLE_IDS } from "../types.js";
import type { InputRecord } from "../types.js";

function textResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

export async function parseScanFile(params: { file: string; format: string }): Promise<InputRecord[]> {
  const format = params.format.toLowerCase();
  if (!isScanFormat(format)) {
    throw Object.assign(
      new Error(`Unsupported format '${params.format}'. Supported: ${getSupportedFormats().join(", ")}`),
      { code: "unsupported_format" }
    );
  }
  return parseFile(format, params.file);
}

export function registerFusionTools(server: McpServer): void {
  server.tool(
    "scan_fuse",
    "Fuse every scan file under a path (file or directory) into one record per host",
    {
      input: z.string().describe("Scan file or directory of nmap XML, .gnmap and .nmap files"),
    },
    async (args) => {
      const result = await fuseInput(args.input);
      return textResult(result);
    }
  );

  server.tool(
    "scan_parse",
    "Parse a single scan file without fusing it",
    {
      file: z.string().describe("Path to the scan file"),
      format: z.string().describe(`Scan format (${getSupportedFormats().join(", ")})`),
    },
    async (args) => {
      const records = await parseScanFile(args);
      return textResult(records);
    }
  );

  server.tool(
    "scan_report",
    "Fuse, enrich and analyze scan files and return the plain-text report",
    {
      input: z.string().describe("Scan file or directory"),
      tables: z.array(z.enum(TABLE_IDS)).optional().describe("Tables to include (default: all)"),
      verbose: z.boolean().optional().describe("Include fusion statistics, CVEs and weak ciphers"),
      config: z.string().optional().describe("Path to a JSON config file"),
    },
    async (args) => {
      const config = await loadConfig(args.config);
      const context = await prepareReport(args.input, args.tables ?? [], config);
      const text = renderTerminalReport(context.analysis, context.summary, context.tables, context.commands, {
        verbose: args.verbose,
      });
      return { content: [{ type: "text" as const, text }] };
    }
  );
}
