import { comparePorts, portKey } from "../fusion/index.js";
import type {
  AnalysisResult,
  EnrichedHost,
  EnrichedPort,
  ExposedHost,
  HostDetail,
  HostSummaryRow,
  PortFrequencyRow,
  ServiceExposure,
} from "../types.js";
import { sortByIp, sortHostsBySubnet, subnetSummary } from "./sort.js";

const SCRIPT_SUMMARY_LIMIT = 3;
const SCRIPT_SUMMARY_WIDTH = 50;

interface PortBucket {
  port: number;
  protocol: string;
  entries: { host: EnrichedHost; port: EnrichedPort }[];
}

// ── Helpers ──

function collectPorts(hosts: EnrichedHost[]): PortBucket[] {
  const buckets = new Map<string, PortBucket>();
  for (const host of sortByIp(hosts)) {
    for (const port of host.ports) {
      const key = portKey(port.port, port.protocol);
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = { port: port.port, protocol: port.protocol, entries: [] };
        buckets.set(key, bucket);
      }
      bucket.entries.push({ host, port });
    }
  }
  return [...buckets.values()].sort(comparePorts);
}

export function mostCommonService(services: string[]): string {
  const counts = new Map<string, number>();
  for (const service of services) {
    counts.set(service, (counts.get(service) ?? 0) + 1);
  }
  let best = "unknown";
  let bestCount = 0;
  for (const [service, count] of counts) {
    if (count > bestCount) {
      best = service;
      bestCount = count;
    }
  }
  return best;
}

// Service detail such as "Ubuntu Linux; protocol 2.0" rides along in parentheses
export function versionLabel(port: Pick<EnrichedPort, "version" | "extrainfo">): string {
  const detail = port.extrainfo ? `(${port.extrainfo})` : "";
  if (!detail || port.version.includes(detail)) return port.version;
  return port.version === "unknown" ? detail : `${port.version} ${detail}`;
}

export function scriptSummary(port: EnrichedPort, host: EnrichedHost): string[] {
  const summaries = port.scripts.map((s) => `${s.id}: ${s.output.slice(0, SCRIPT_SUMMARY_WIDTH)}`);
  const marker = `port ${port.port}`;
  for (const script of host.scripts) {
    if (script.output.toLowerCase().includes(marker)) {
      summaries.push(`${script.id}: ${script.output.slice(0, SCRIPT_SUMMARY_WIDTH)}`);
    }
  }
  return summaries.slice(0, SCRIPT_SUMMARY_LIMIT);
}

// ── Tables ──

export function buildHostSummary(hosts: EnrichedHost[]): HostSummaryRow[] {
  return hosts.map((host) => ({
    ip: host.ip,
    hostname: host.hostname,
    total_ports: host.ports.length,
    tcp_ports: host.ports.filter((p) => p.protocol === "tcp").length,
    udp_ports: host.ports.filter((p) => p.protocol === "udp").length,
    total_services: new Set(host.ports.map((p) => p.service).filter((s) => s !== "unknown")).size,
    os: host.os,
    risk_level: host.risk_level,
  }));
}

export function buildHostDetails(hosts: EnrichedHost[]): HostDetail[] {
  return hosts.map((host) => ({
    ip: host.ip,
    hostname: host.hostname,
    os: host.os,
    risk_level: host.risk_level,
    ports: [...host.ports].sort(comparePorts).map((port) => ({
      port: port.port,
      protocol: port.protocol,
      service: port.service,
      version: versionLabel(port),
      risk: port.risk.level,
      script_summary: scriptSummary(port, host),
      business_function: port.business_function,
    })),
    cves: host.cves,
    weak_ciphers: host.weak_ciphers,
  }));
}

export function buildPortFrequency(hosts: EnrichedHost[]): PortFrequencyRow[] {
  return collectPorts(hosts).map((bucket) => ({
    port: bucket.port,
    protocol: bucket.protocol,
    count: bucket.entries.length,
    ip_list: bucket.entries.map((e) => e.host.ip),
    service: mostCommonService(bucket.entries.map((e) => e.port.service)),
  }));
}

export function buildServiceExposure(hosts: EnrichedHost[]): ServiceExposure[] {
  return collectPorts(hosts).map((bucket) => {
    const exposed: ExposedHost[] = bucket.entries.map(({ host, port }) => ({
      ip: host.ip,
      hostname: host.hostname,
      os: host.os,
      service: port.service,
      version: versionLabel(port),
      business_function: port.business_function,
      risk: port.risk.level,
    }));
    return {
      port: bucket.port,
      protocol: bucket.protocol,
      host_count: exposed.length,
      service: mostCommonService(bucket.entries.map((e) => e.port.service)),
      hosts: exposed,
    };
  });
}

export function analyze(hosts: EnrichedHost[]): AnalysisResult {
  const sorted = sortHostsBySubnet(hosts);
  return {
    table1: buildHostSummary(sorted),
    table2: buildHostDetails(sorted),
    table3: buildPortFrequency(sorted),
    table4: buildServiceExposure(sorted),
    sorted_hosts: sorted,
    subnets: subnetSummary(sorted),
  };
}
