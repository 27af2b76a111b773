import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { InputRecord, PortObservation, UnifiedHost, UnifiedPort } from "../types.js";

export function makePort(overrides: Partial<PortObservation> = {}): PortObservation {
  return {
    port: 80,
    protocol: "tcp",
    state: "open",
    service: "http",
    version: "unknown",
    product: "",
    extrainfo: "",
    scripts: [],
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<InputRecord> = {}): InputRecord {
  return {
    ip: "10.0.0.1",
    hostname: "",
    os: "unknown",
    ports: [],
    scripts: [],
    weak_ciphers: [],
    cves: [],
    command: "",
    source_file: "",
    ...overrides,
  };
}

export const FIXTURES_DIR = path.join(fileURLToPath(new URL(".", import.meta.url)), "fixtures");

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `scan-fusion-${prefix}-`));
}

export function makeUnifiedPort(overrides: Partial<UnifiedPort> = {}): UnifiedPort {
  return { ...makePort(), ...overrides };
}

export function makeUnifiedHost(overrides: Partial<UnifiedHost> = {}): UnifiedHost {
  return {
    ip: "10.0.0.1",
    hostname: "",
    os: "unknown",
    ports: [],
    scripts: [],
    weak_ciphers: [],
    cves: [],
    subnet: "10.0.0.0/24",
    commands: [],
    source_files: [],
    port_count: 0,
    first_seen: null,
    last_seen: null,
    ...overrides,
  };
}
