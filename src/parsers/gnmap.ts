import { isIP } from "node:net";
import type { InputRecord, PortObservation, ScanParser } from "../types.js";
import { extractCommand } from "./findings.js";

// Greppable output, one "Host:" line per finding group, tab separated:
//   Host: 10.0.0.1 (web1)	Ports: 22/open/tcp//ssh//OpenSSH 8.9p1/, 80/open/tcp//http///	OS: Linux 5.4
// Older exporters write port/protocol/state/service/version instead.

const PORT_STATES = new Set(["open", "closed", "filtered", "open|filtered", "closed|filtered", "unfiltered"]);

function versionFrom(fields: string[]): string {
  const kept = fields.filter((f) => f && f !== "none" && !f.startsWith("conf="));
  return kept.join(" ").trim() || "unknown";
}

export function parsePortEntries(value: string): PortObservation[] {
  const ports: PortObservation[] = [];

  for (const raw of value.split(/,\s*(?=\d+\/)/)) {
    const entry = raw.trim();
    if (!entry) continue;

    const parts = entry.split("/");
    if (parts.length < 3) continue;

    const port = /^\d+$/.test(parts[0]) ? Number(parts[0]) : 0;
    let state: string;
    let protocol: string;
    let service: string;
    let version: string;

    if (PORT_STATES.has(parts[1])) {
      state = parts[1];
      protocol = parts[2] || "tcp";
      service = parts[4] || "unknown";
      version = versionFrom(parts.slice(5));
    } else {
      protocol = parts[1] || "tcp";
      state = parts[2] || "open";
      service = parts[3] || "unknown";
      version = versionFrom(parts.slice(4));
    }

    if (state !== "open") continue;
    ports.push({ port, protocol, state, service, version, product: "", extrainfo: "", scripts: [] });
  }

  return ports;
}

function parseGnmap(content: string, sourceFile: string): InputRecord[] {
  const lines = content.split(/\r?\n/);
  const command = extractCommand(lines[0] ?? "");
  const hostMap = new Map<string, InputRecord>();

  for (const line of lines) {
    if (!line.startsWith("Host:")) continue;

    const fields = line.split("\t");
    const hostMatch = fields[0].match(/^Host:\s+([0-9a-fA-F:.]+)\s*(?:\(([^)]*)\))?/);
    if (!hostMatch || !isIP(hostMatch[1])) continue;

    const ip = hostMatch[1];
    let host = hostMap.get(ip);
    if (!host) {
      host = {
        ip,
        hostname: "",
        os: "unknown",
        ports: [],
        scripts: [],
        weak_ciphers: [],
        cves: [],
        command,
        source_file: sourceFile,
      };
      hostMap.set(ip, host);
    }

    const hostname = hostMatch[2]?.trim() ?? "";
    if (hostname && !host.hostname) host.hostname = hostname;

    for (const field of fields.slice(1)) {
      const sep = field.indexOf(":");
      if (sep < 0) continue;
      const key = field.slice(0, sep).trim();
      const value = field.slice(sep + 1).trim();

      if (key === "Ports") {
        host.ports.push(...parsePortEntries(value));
      } else if (key === "OS" && value && host.os === "unknown") {
        host.os = value;
      }
    }
  }

  return Array.from(hostMap.values());
}

export const gnmapParser: ScanParser = {
  format: "gnmap",
  async parse(content: string, sourceFile: string): Promise<InputRecord[]> {
    return parseGnmap(content, sourceFile);
  },
};
