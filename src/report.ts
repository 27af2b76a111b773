import { analyze } from "./analysis/analyzer.js";
import type { ScanFusionConfig } from "./config.js";
import { Enricher } from "./enrich/enricher.js";
import { fuseInput } from "./pipeline.js";
import { TABLE_IDS } from "./types.js";
import type { FusionResult, ReportContext, TableId } from "./types.js";

export function orderTables(tables: readonly TableId[]): TableId[] {
  const selected = new Set(tables);
  const ordered = TABLE_IDS.filter((id) => selected.has(id));
  return ordered.length > 0 ? ordered : [...TABLE_IDS];
}

export interface TableFlags {
  table1?: boolean;
  table2?: boolean;
  table3?: boolean;
  table4?: boolean;
  all?: boolean;
}

/** Tables picked by CLI flags; none picked means all of them. */
export function selectTables(flags: TableFlags): TableId[] {
  if (flags.all) return [...TABLE_IDS];
  return orderTables(TABLE_IDS.filter((id) => flags[id]));
}

/** Distinct scan commands across all hosts, sorted. */
export function collectCommands(result: FusionResult): string[] {
  const commands = new Set<string>();
  for (const host of result.hosts) {
    for (const cmd of host.commands) commands.add(cmd);
  }
  return [...commands].sort();
}

export function assertHasHosts(context: ReportContext, inputPath: string): void {
  if (context.analysis.sorted_hosts.length === 0) {
    throw Object.assign(new Error(`No hosts found in ${inputPath}`), { code: "no_hosts" });
  }
}

export async function buildReportContext(
  result: FusionResult,
  tables: readonly TableId[],
  config: ScanFusionConfig = {},
  generatedAt: Date = new Date()
): Promise<ReportContext> {
  const enricher = await Enricher.create(config);
  return {
    analysis: analyze(enricher.enrichHosts(result.hosts)),
    summary: result.summary,
    commands: collectCommands(result),
    tables: orderTables(tables),
    generated_at: generatedAt,
  };
}

/** Discover, fuse, enrich and analyze everything under `inputPath`. */
export async function prepareReport(
  inputPath: string,
  tables: readonly TableId[],
  config: ScanFusionConfig = {}
): Promise<ReportContext> {
  const result = await fuseInput(inputPath);
  return buildReportContext(result, tables, config);
}
