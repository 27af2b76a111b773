import { isIP } from "node:net";
import type { InputRecord, PortObservation, ScanParser } from "../types.js";
import { extractCommand, extractFindings, makeScriptFinding } from "./findings.js";

// Normal (-oN) output. Script blocks look like
//   | ssl-cert: Subject: commonName=web1
//   | Issuer: commonName=web1
//   |_Not valid after:  2021-01-01T00:00:00
// and attach to the port line above them, or to the host under "Host script results:".

const REPORT_PREFIX = "Nmap scan report for";
const SCRIPT_START = /^\|([ _])([a-z0-9][a-z0-9_.-]*):(?:\s+(.*))?$/;

type ScriptOwner = PortObservation | "host" | null;

interface OpenScript {
  id: string;
  lines: string[];
  owner: ScriptOwner;
}

function newRecord(command: string, sourceFile: string): InputRecord {
  return {
    ip: "",
    hostname: "",
    os: "unknown",
    ports: [],
    scripts: [],
    weak_ciphers: [],
    cves: [],
    command,
    source_file: sourceFile,
  };
}

function applyReportLine(line: string, record: InputRecord): void {
  const rest = line.slice(REPORT_PREFIX.length).trim();
  const ipMatch = rest.match(/\(([0-9a-fA-F:.]+)\)/);
  if (ipMatch) {
    if (isIP(ipMatch[1])) record.ip = ipMatch[1];
    record.hostname = rest.replace(`(${ipMatch[1]})`, "").trim();
  } else if (isIP(rest)) {
    record.ip = rest;
  } else {
    record.hostname = rest;
  }
}

function parsePortLine(line: string): PortObservation | null | undefined {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 3) return undefined;

  const [portNumber, protocol = "tcp"] = parts[0].split("/");
  if (!/^\d+$/.test(portNumber)) return undefined;

  const state = parts[1];
  if (state !== "open") return null;

  return {
    port: Number(portNumber),
    protocol,
    state,
    service: parts[2],
    version: parts.length > 3 ? parts.slice(3).join(" ") : "unknown",
    product: "",
    extrainfo: "",
    scripts: [],
  };
}

function parseNormal(content: string, sourceFile: string): InputRecord[] {
  const records: InputRecord[] = [];
  let command = "";
  let current: InputRecord | null = null;
  let inPorts = false;
  let inHostScripts = false;
  let lastPort: ScriptOwner = null;
  let script: OpenScript | null = null;

  const closeScript = (): void => {
    if (!script || !current) {
      script = null;
      return;
    }
    const finding = makeScriptFinding(script.id, script.lines.join("\n"));
    if (finding && script.owner) {
      if (script.owner !== "host") {
        script.owner.scripts.push(finding);
      }
      current.scripts.push(finding);
      extractFindings(finding, current, script.owner === "host" ? null : script.owner.port);
    }
    script = null;
  };

  const closeHost = (): void => {
    closeScript();
    if (current) records.push(current);
    current = null;
    inPorts = false;
    inHostScripts = false;
    lastPort = null;
  };

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith("# Nmap") && line.toLowerCase().includes("scan initiated")) {
      command = extractCommand(line);
      continue;
    }

    if (line.startsWith(REPORT_PREFIX)) {
      closeHost();
      current = newRecord(command, sourceFile);
      applyReportLine(line, current);
      continue;
    }

    if (line.startsWith("Nmap done:")) {
      closeHost();
      continue;
    }

    if (!current) continue;

    if (/^PORT\s+STATE\s+SERVICE/.test(line)) {
      inPorts = true;
      inHostScripts = false;
      continue;
    }

    if (line.startsWith("Host script results:")) {
      closeScript();
      inPorts = false;
      inHostScripts = true;
      continue;
    }

    if (line.startsWith("OS details:")) {
      const os = line.slice("OS details:".length).trim();
      if (os) current.os = os;
      continue;
    }

    if (!inPorts && !inHostScripts) continue;

    if (line.trim() === "") {
      closeScript();
      inPorts = false;
      inHostScripts = false;
      continue;
    }

    if (line.startsWith("|")) {
      const start = line.match(SCRIPT_START);
      if (start) {
        closeScript();
        script = {
          id: start[2],
          lines: start[3] ? [start[3]] : [],
          owner: inHostScripts ? "host" : lastPort,
        };
        if (start[1] === "_") closeScript();
      } else if (script) {
        script.lines.push(line.replace(/^\|_?/, "").trim());
        if (line.startsWith("|_")) closeScript();
      }
      continue;
    }

    if (inPorts) {
      closeScript();
      const port = parsePortLine(line);
      if (port === undefined) continue;
      // Scripts under closed or filtered ports are dropped with the port
      lastPort = port;
      if (port) current.ports.push(port);
    }
  }

  closeHost();
  return records;
}

export const normalParser: ScanParser = {
  format: "nmap",
  async parse(content: string, sourceFile: string): Promise<InputRecord[]> {
    return parseNormal(content, sourceFile);
  },
};
