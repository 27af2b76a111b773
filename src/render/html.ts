import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import handlebars from "handlebars";
import { withLock, writeFileAtomic } from "../storage/index.js";
import { RISK_LEVELS } from "../types.js";
import type { ReportContext, ReportOptions, TableId } from "../types.js";
import { riskDistribution } from "./terminal.js";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../../templates/report.hbs", import.meta.url));

const hbs = handlebars.create();
hbs.registerHelper("upper", (value: unknown) => String(value ?? "").toUpperCase());
hbs.registerHelper("join", (value: unknown, sep: unknown) =>
  Array.isArray(value) ? value.join(typeof sep === "string" ? sep : ", ") : ""
);
hbs.registerHelper("dash", (value: unknown) => (value === undefined || value === null || value === "" || value === "unknown" ? "-" : value));

type CompiledTemplate = ReturnType<typeof hbs.compile>;

const templateCache = new Map<string, CompiledTemplate>();

async function loadTemplate(templatePath: string): Promise<CompiledTemplate> {
  const cached = templateCache.get(templatePath);
  if (cached) return cached;
  const source = await fs.readFile(templatePath, "utf-8");
  const compiled = hbs.compile(source);
  templateCache.set(templatePath, compiled);
  return compiled;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function reportStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function reportLockPath(outputDir: string): string {
  return path.join(outputDir, ".scan-fusion.lock");
}

function buildView(context: ReportContext, options: ReportOptions) {
  const { analysis, summary } = context;
  const hosts = analysis.sorted_hosts;
  const selected = new Set<TableId>(context.tables);
  const counts = riskDistribution(analysis);

  return {
    generated_at: context.generated_at.toISOString(),
    commands: context.commands,
    summary,
    verbose: options.verbose ?? false,
    stats: {
      total_hosts: hosts.length,
      total_ports: hosts.reduce((sum, h) => sum + h.ports.length, 0),
      total_cves: hosts.reduce((sum, h) => sum + h.cves.length, 0),
      total_weak_ciphers: hosts.reduce((sum, h) => sum + h.weak_ciphers.length, 0),
    },
    risk_counts: RISK_LEVELS.map((level) => ({ level, count: counts[level] })),
    show_table1: selected.has("table1"),
    show_table2: selected.has("table2"),
    show_table3: selected.has("table3"),
    show_table4: selected.has("table4"),
    table1: analysis.table1,
    table2: analysis.table2,
    table3: analysis.table3,
    table4: analysis.table4,
    subnets: analysis.subnets,
  };
}

export async function renderHtmlReport(
  context: ReportContext,
  options: ReportOptions = {},
  templatePath: string = DEFAULT_TEMPLATE_PATH
): Promise<string> {
  const template = await loadTemplate(templatePath);
  return template(buildView(context, options));
}

export async function writeHtmlReport(
  context: ReportContext,
  outputDir: string,
  options: ReportOptions = {}
): Promise<string> {
  const html = await renderHtmlReport(context, options);
  const filePath = path.join(outputDir, `scan-fusion-report-${reportStamp(context.generated_at)}.html`);
  await withLock(reportLockPath(outputDir), () => writeFileAtomic(filePath, html));
  return filePath;
}
