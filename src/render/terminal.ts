import { RISK_LEVELS } from "../types.js";
import type {
  AnalysisResult,
  FusionSummary,
  HostDetail,
  HostSummaryRow,
  PortFrequencyRow,
  ReportOptions,
  RiskLevel,
  ServiceExposure,
  TableId,
} from "../types.js";

const TABLE3_ROWS = 20;
const TABLE4_PORTS = 10;
const TABLE4_HOSTS = 15;
const SAMPLE_IPS = 5;

// ── Helpers ──

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) + "…" : value;
}

function cell(value: string | number): string {
  return String(value).replace(/\|/g, "\\|");
}

export function pipeTable(headers: string[], rows: (string | number)[][]): string {
  const lines = [`| ${headers.join(" | ")} |`, `|${headers.map(() => "---").join("|")}|`];
  for (const row of rows) {
    lines.push(`| ${row.map(cell).join(" | ")} |`);
  }
  return lines.join("\n") + "\n";
}

function heading(title: string): string {
  return `## ${title}\n\n`;
}

function orDash(value: string, sentinel = ""): string {
  return value && value !== sentinel ? value : "-";
}

// ── Sections ──

function renderCommands(commands: string[]): string {
  let md = heading("Scan Configuration");
  if (commands.length === 0) {
    md += "*No commands found in scan files.*\n\n";
    return md;
  }
  for (const cmd of commands) {
    md += `- \`${cmd}\`\n`;
  }
  return md + "\n";
}

function renderFusionStats(summary: FusionSummary): string {
  let md = heading("Fusion Statistics");
  md += `- Files processed: ${summary.files_processed}\n`;
  md += `- Unique IPs: ${summary.unique_ips}\n`;
  md += `- Ports seen: ${summary.total_ports_seen}\n`;
  md += `- Ports after fusion: ${summary.ports_after_fusion}\n`;
  md += `- Duplicates removed: ${summary.duplicate_ports_removed}\n`;
  md += `- Scripts merged: ${summary.scripts_merged}\n\n`;
  return md;
}

export function renderHostSummary(rows: HostSummaryRow[]): string {
  let md = heading("Table 1: Host Summary");
  if (rows.length === 0) return md + "*No host data available.*\n\n";

  md += pipeTable(
    ["IP", "Hostname", "Ports", "TCP", "UDP", "Services", "OS", "Risk"],
    rows.map((r) => [
      r.ip,
      truncate(orDash(r.hostname), 25),
      r.total_ports,
      r.tcp_ports,
      r.udp_ports,
      r.total_services,
      truncate(orDash(r.os, "unknown"), 20),
      r.risk_level.toUpperCase(),
    ])
  );
  const openPorts = rows.reduce((sum, r) => sum + r.total_ports, 0);
  md += `\nTotal hosts: ${rows.length} | Total open ports: ${openPorts}\n\n`;
  return md;
}

export function renderHostDetails(details: HostDetail[], options: ReportOptions = {}): string {
  let md = heading("Table 2: Host Details");
  if (details.length === 0) return md + "*No host data available.*\n\n";

  for (const host of details) {
    md += `### ${host.ip}`;
    if (host.hostname) md += ` (${host.hostname})`;
    md += ` | OS: ${truncate(host.os, 30)} | Risk: ${host.risk_level.toUpperCase()}\n\n`;

    if (host.ports.length === 0) {
      md += "*No open ports detected.*\n\n";
      continue;
    }

    md += pipeTable(
      ["Port", "Proto", "Service", "Version", "Risk", "Function", "Script Findings"],
      host.ports.map((p) => [
        p.port,
        p.protocol,
        p.service,
        truncate(orDash(p.version, "unknown"), 35),
        p.risk.toUpperCase(),
        p.business_function,
        truncate(p.script_summary.slice(0, 2).join("; ") || "-", 45),
      ])
    );
    md += "\n";

    if (options.verbose && host.cves.length > 0) {
      md += "**Vulnerabilities:**\n";
      for (const cve of host.cves.slice(0, 5)) {
        md += `- ${cve.id}${cve.port === null ? "" : ` (port ${cve.port})`}\n`;
      }
      md += "\n";
    }

    if (options.verbose && host.weak_ciphers.length > 0) {
      md += "**Weak cryptographic configuration:**\n";
      for (const cipher of host.weak_ciphers.slice(0, 3)) {
        md += `- ${cipher.cipher}${cipher.port === null ? "" : ` (port ${cipher.port})`}\n`;
      }
      md += "\n";
    }
  }
  return md;
}

export function renderPortFrequency(rows: PortFrequencyRow[]): string {
  let md = heading("Table 3: Port Frequency");
  if (rows.length === 0) return md + "*No port data available.*\n\n";

  md += pipeTable(
    ["Port", "Proto", "Hosts", "Service", "Sample Hosts"],
    rows.slice(0, TABLE3_ROWS).map((r) => {
      let sample = r.ip_list.slice(0, SAMPLE_IPS).join(", ");
      if (r.ip_list.length > SAMPLE_IPS) sample += ` +${r.ip_list.length - SAMPLE_IPS} more`;
      return [r.port, r.protocol, r.count, r.service, truncate(sample, 50)];
    })
  );

  const top = rows.reduce((best, r) => (r.count > best.count ? r : best), rows[0]);
  md += `\nUnique ports: ${rows.length} | Most frequent: ${top.port}/${top.protocol} (${top.count} hosts)\n\n`;
  return md;
}

export function renderServiceExposure(entries: ServiceExposure[]): string {
  let md = heading("Table 4: Service Exposure");
  if (entries.length === 0) return md + "*No service exposure data available.*\n\n";

  for (const entry of entries.slice(0, TABLE4_PORTS)) {
    md += `### ${entry.port}/${entry.protocol} | Exposure: ${entry.host_count} hosts | Service: ${entry.service}\n\n`;
    md += pipeTable(
      ["IP", "Hostname", "OS", "Version", "Risk"],
      entry.hosts.slice(0, TABLE4_HOSTS).map((h) => [
        h.ip,
        truncate(orDash(h.hostname), 20),
        truncate(h.os, 15),
        truncate(orDash(h.version, "unknown"), 35),
        h.risk.toUpperCase(),
      ])
    );
    if (entry.hosts.length > TABLE4_HOSTS) {
      md += `\n... and ${entry.hosts.length - TABLE4_HOSTS} additional hosts\n`;
    }
    md += "\n";
  }

  if (entries.length > TABLE4_PORTS) {
    md += `... and ${entries.length - TABLE4_PORTS} additional ports\n\n`;
  }
  return md;
}

export function riskDistribution(analysis: AnalysisResult): Record<RiskLevel, number> {
  const counts: Record<RiskLevel, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const host of analysis.sorted_hosts) {
    counts[host.risk_level]++;
  }
  return counts;
}

function renderExecutiveSummary(analysis: AnalysisResult): string {
  const hosts = analysis.sorted_hosts;
  let md = heading("Executive Summary");
  md += `- Hosts analyzed: ${hosts.length}\n`;
  md += `- Open ports: ${hosts.reduce((sum, h) => sum + h.ports.length, 0)}\n`;
  md += `- CVEs found: ${hosts.reduce((sum, h) => sum + h.cves.length, 0)}\n`;
  md += `- Weak cipher findings: ${hosts.reduce((sum, h) => sum + h.weak_ciphers.length, 0)}\n`;
  const counts = riskDistribution(analysis);
  for (const level of RISK_LEVELS) {
    md += `- ${level.toUpperCase()} risk hosts: ${counts[level]}\n`;
  }
  return md;
}

/** Plain-text report for stdout; tables always come out in 1 to 4 order. */
export function renderTerminalReport(
  analysis: AnalysisResult,
  summary: FusionSummary,
  tables: TableId[],
  commands: string[],
  options: ReportOptions = {}
): string {
  let md = "# Scan Fusion Report\n\n";
  md += renderCommands(commands);
  if (options.verbose) md += renderFusionStats(summary);

  const selected = new Set(tables);
  if (selected.has("table1")) md += renderHostSummary(analysis.table1);
  if (selected.has("table2")) md += renderHostDetails(analysis.table2, options);
  if (selected.has("table3")) md += renderPortFrequency(analysis.table3);
  if (selected.has("table4")) md += renderServiceExposure(analysis.table4);

  md += renderExecutiveSummary(analysis);
  return md;
}
