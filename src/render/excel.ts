import * as path from "node:path";
import ExcelJS from "exceljs";
import { withLock, writeFileAtomic } from "../storage/index.js";
import { RISK_LEVELS, TABLE_IDS } from "../types.js";
import type { EnrichedHost, ReportContext, TableId } from "../types.js";
import { reportLockPath, reportStamp } from "./html.js";
import { riskDistribution } from "./terminal.js";

type CellValue = string | number;

export const SHEET_NAMES = {
  summary: "Executive Summary",
  table1: "1 Host Summary",
  table2: "2 Host Details",
  table3: "3 Port Frequency",
  table4: "4 Service Exposure",
  commands: "Scan Configuration",
  scripts: "Script Findings",
  subnets: "Subnet Summary",
  raw: "Raw Data",
} as const;

const MAX_COLUMN_WIDTH = 60;
const HEADER_FILL = "FF1F4E79";

// ── Helpers ──

function titleCase(value: string): string {
  return value
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function columnWidth(values: CellValue[]): number {
  const longest = values.reduce<number>((max, v) => Math.max(max, String(v).length), 0);
  return Math.min(longest + 2, MAX_COLUMN_WIDTH);
}

function addTable(workbook: ExcelJS.Workbook, name: string, headers: string[], rows: CellValue[][]): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet(name);
  const header = sheet.addRow(headers);
  header.font = { bold: true, color: { argb: "FFFFFFFF" } };
  header.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_FILL } };

  for (const row of rows) {
    sheet.addRow(row);
  }

  headers.forEach((h, i) => {
    sheet.getColumn(i + 1).width = columnWidth([h, ...rows.map((r) => r[i] ?? "")]);
  });
  return sheet;
}

// ── Sheets ──

function addSummarySheet(workbook: ExcelJS.Workbook, context: ReportContext): void {
  const hosts = context.analysis.sorted_hosts;
  const counts = riskDistribution(context.analysis);
  const rows: CellValue[][] = [
    ["Generated", context.generated_at.toISOString()],
    ["Files processed", context.summary.files_processed],
    ["Hosts", hosts.length],
    ["Open ports", hosts.reduce((sum, h) => sum + h.ports.length, 0)],
    ["Duplicate ports removed", context.summary.duplicate_ports_removed],
    ["CVEs", hosts.reduce((sum, h) => sum + h.cves.length, 0)],
    ["Weak cipher findings", hosts.reduce((sum, h) => sum + h.weak_ciphers.length, 0)],
    ...RISK_LEVELS.map((level): CellValue[] => [`${titleCase(level)} risk hosts`, counts[level]]),
  ];
  addTable(workbook, SHEET_NAMES.summary, ["Metric", "Value"], rows);
}

function addHostSummarySheet(workbook: ExcelJS.Workbook, context: ReportContext): void {
  addTable(
    workbook,
    SHEET_NAMES.table1,
    ["IP", "Hostname", "Total Ports", "TCP", "UDP", "Services", "OS", "Risk"],
    context.analysis.table1.map((r) => [
      r.ip,
      r.hostname,
      r.total_ports,
      r.tcp_ports,
      r.udp_ports,
      r.total_services,
      r.os,
      r.risk_level.toUpperCase(),
    ])
  );
}

function addHostDetailSheet(workbook: ExcelJS.Workbook, context: ReportContext): void {
  const rows: CellValue[][] = [];
  for (const host of context.analysis.table2) {
    for (const p of host.ports) {
      rows.push([
        host.ip,
        host.hostname,
        host.os,
        p.port,
        p.protocol,
        p.service,
        p.version,
        p.risk.toUpperCase(),
        p.script_summary.join("; "),
        titleCase(p.business_function),
      ]);
    }
  }
  addTable(
    workbook,
    SHEET_NAMES.table2,
    ["IP", "Hostname", "OS", "Port", "Protocol", "Service", "Version", "Risk", "Script Findings", "Business Function"],
    rows
  );
}

function addPortFrequencySheet(workbook: ExcelJS.Workbook, context: ReportContext): void {
  addTable(
    workbook,
    SHEET_NAMES.table3,
    ["Port", "Protocol", "Host Count", "Service", "IP List"],
    context.analysis.table3.map((r) => [r.port, r.protocol, r.count, r.service, r.ip_list.join(", ")])
  );
}

function addServiceExposureSheet(workbook: ExcelJS.Workbook, context: ReportContext): void {
  const rows: CellValue[][] = [];
  for (const entry of context.analysis.table4) {
    for (const h of entry.hosts) {
      rows.push([
        entry.port,
        entry.protocol,
        entry.service,
        h.ip,
        h.hostname,
        h.os,
        h.version,
        titleCase(h.business_function),
        h.risk.toUpperCase(),
      ]);
    }
  }
  addTable(
    workbook,
    SHEET_NAMES.table4,
    ["Port", "Protocol", "Service", "IP", "Hostname", "OS", "Version", "Business Function", "Risk"],
    rows
  );
}

function addScriptSheet(workbook: ExcelJS.Workbook, hosts: EnrichedHost[]): void {
  const rows: CellValue[][] = [];
  for (const host of hosts) {
    for (const port of host.ports) {
      for (const script of port.scripts) {
        rows.push([host.ip, `${port.port}/${port.protocol}`, script.id, script.output]);
      }
    }
    // Port scripts are mirrored on the host list; only list host-level ones here
    const portScriptIds = new Set(host.ports.flatMap((p) => p.scripts.map((s) => s.id)));
    for (const script of host.scripts) {
      if (!portScriptIds.has(script.id)) rows.push([host.ip, "host", script.id, script.output]);
    }
  }
  addTable(workbook, SHEET_NAMES.scripts, ["IP", "Port", "Script", "Output"], rows);
}

function addRawDataSheet(workbook: ExcelJS.Workbook, hosts: EnrichedHost[]): void {
  const rows: CellValue[][] = [];
  for (const host of hosts) {
    if (host.ports.length === 0) {
      rows.push([host.ip, host.hostname, host.os, host.subnet, "", "", "", "", "", host.risk_score]);
      continue;
    }
    for (const p of host.ports) {
      rows.push([
        host.ip,
        host.hostname,
        host.os,
        host.subnet,
        p.port,
        p.protocol,
        p.service,
        p.version,
        p.risk.score,
        host.risk_score,
      ]);
    }
  }
  addTable(
    workbook,
    SHEET_NAMES.raw,
    ["IP", "Hostname", "OS", "Subnet", "Port", "Protocol", "Service", "Version", "Port Risk Score", "Host Risk Score"],
    rows
  );
}

/** Workbook sheets follow the report order: summary, selected tables, then reference sheets. */
export function buildWorkbook(context: ReportContext): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "scan-fusion";
  workbook.created = context.generated_at;

  const builders: Record<TableId, (wb: ExcelJS.Workbook, ctx: ReportContext) => void> = {
    table1: addHostSummarySheet,
    table2: addHostDetailSheet,
    table3: addPortFrequencySheet,
    table4: addServiceExposureSheet,
  };

  addSummarySheet(workbook, context);
  const selected = new Set(context.tables);
  for (const id of TABLE_IDS) {
    if (selected.has(id)) builders[id](workbook, context);
  }

  addTable(
    workbook,
    SHEET_NAMES.commands,
    ["Command"],
    context.commands.map((cmd) => [cmd])
  );
  addScriptSheet(workbook, context.analysis.sorted_hosts);
  addTable(
    workbook,
    SHEET_NAMES.subnets,
    ["Subnet", "Host Count", "IP Range"],
    context.analysis.subnets.map((s) => [s.subnet, s.host_count, s.ip_range])
  );
  addRawDataSheet(workbook, context.analysis.sorted_hosts);
  return workbook;
}

export async function writeExcelReport(context: ReportContext, outputDir: string): Promise<string> {
  const workbook = buildWorkbook(context);
  const buffer = await workbook.xlsx.writeBuffer();
  const filePath = path.join(outputDir, `scan-fusion-report-${reportStamp(context.generated_at)}.xlsx`);
  await withLock(reportLockPath(outputDir), () => writeFileAtomic(filePath, new Uint8Array(buffer)));
  return filePath;
}
