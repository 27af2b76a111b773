import type {
  CveFinding,
  InputRecord,
  ScriptFinding,
  UnifiedHost,
  UnifiedPort,
  WeakCipherFinding,
} from "../types.js";
import { FusionStateError } from "./errors.js";
import { PortMergeUnit, comparePorts, portKey } from "./port.js";
import { extractSubnet } from "./subnet.js";

const UNKNOWN_OS = "unknown";

function cveKey(cve: CveFinding): string {
  return `${cve.id}|${cve.script}|${cve.port ?? ""}`;
}

function weakCipherKey(cipher: WeakCipherFinding): string {
  return `${cipher.cipher}|${cipher.port ?? ""}`;
}

/**
 * Picks the most frequent OS guess, then lets any strictly longer guess
 * override it so "Linux 4.15" beats a more common "Linux".
 */
export function selectBestOs(candidates: readonly string[]): string {
  if (candidates.length === 0) return UNKNOWN_OS;

  const counts = new Map<string, number>();
  for (const candidate of candidates) {
    counts.set(candidate, (counts.get(candidate) ?? 0) + 1);
  }

  // Ties go to the guess that arrived first
  let best = candidates[0];
  let bestCount = 0;
  for (const [candidate, count] of counts) {
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }

  for (const candidate of candidates) {
    if (candidate.length > best.length) {
      best = candidate;
    }
  }
  return best;
}

export class HostFusionRecord {
  readonly ip: string;
  readonly subnet: string;
  private hostname = "";
  private readonly osCandidates: string[] = [];
  private readonly ports = new Map<string, PortMergeUnit>();
  private readonly scripts: ScriptFinding[] = [];
  private cves: CveFinding[] = [];
  private readonly weakCiphers: WeakCipherFinding[] = [];
  private readonly commands = new Set<string>();
  private readonly sourceFiles = new Set<string>();
  private readonly timestamps: string[] = [];
  private bestOs = UNKNOWN_OS;
  private finalPorts: UnifiedPort[] = [];
  private finalized = false;

  constructor(ip: string) {
    this.ip = ip;
    this.subnet = extractSubnet(ip);
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  get portCount(): number {
    return this.finalized ? this.finalPorts.length : this.ports.size;
  }

  get scriptCount(): number {
    return this.scripts.length;
  }

  get osCandidateList(): readonly string[] {
    return this.osCandidates;
  }

  merge(record: InputRecord): void {
    if (this.finalized) {
      throw new FusionStateError("already_finalized", `Host ${this.ip} is finalized; no further merges`);
    }

    if (record.hostname && !this.hostname) {
      this.hostname = record.hostname;
    }

    if (record.os && record.os !== UNKNOWN_OS) {
      this.osCandidates.push(record.os);
    }

    for (const observation of record.ports) {
      const key = portKey(observation.port, observation.protocol);
      const unit = this.ports.get(key);
      if (unit) {
        unit.merge(observation);
      } else {
        this.ports.set(key, new PortMergeUnit(observation));
      }
    }

    for (const script of record.scripts) {
      this.mergeScript(script);
    }

    for (const cve of record.cves) {
      const key = cveKey(cve);
      if (!this.cves.some((c) => cveKey(c) === key)) {
        this.cves.push(cve);
      }
    }

    for (const cipher of record.weak_ciphers) {
      const key = weakCipherKey(cipher);
      if (!this.weakCiphers.some((c) => weakCipherKey(c) === key)) {
        this.weakCiphers.push(cipher);
      }
    }

    if (record.command) this.commands.add(record.command);
    if (record.source_file) this.sourceFiles.add(record.source_file);
    if (record.timestamp) this.timestamps.push(record.timestamp);
  }

  // Same id means same finding; differing output is appended, never duplicated
  private mergeScript(script: ScriptFinding): void {
    const existing = this.scripts.find((s) => s.id === script.id);
    if (!existing) {
      this.scripts.push({ ...script });
      return;
    }
    if (existing.output !== script.output) {
      existing.output += "; " + script.output;
    }
  }

  finalize(): void {
    this.bestOs = selectBestOs(this.osCandidates);

    this.finalPorts = [...this.ports.values()].map((unit) => unit.finalize()).sort(comparePorts);

    // Keyed by id: the last copy wins, at the position of the first
    const byId = new Map<string, CveFinding>();
    for (const cve of this.cves) {
      byId.set(cve.id, cve);
    }
    this.cves = [...byId.values()];

    this.finalized = true;
  }

  toDict(): UnifiedHost {
    if (!this.finalized) {
      throw new FusionStateError("not_finalized", `Host ${this.ip} has not been finalized`);
    }

    const sortedTimes = [...this.timestamps].sort();
    return {
      ip: this.ip,
      hostname: this.hostname,
      os: this.bestOs,
      ports: [...this.finalPorts],
      scripts: this.scripts.map((s) => ({ ...s })),
      weak_ciphers: [...this.weakCiphers],
      cves: [...this.cves],
      subnet: this.subnet,
      commands: [...this.commands],
      source_files: [...this.sourceFiles],
      port_count: this.finalPorts.length,
      first_seen: sortedTimes[0] ?? null,
      last_seen: sortedTimes[sortedTimes.length - 1] ?? null,
    };
  }
}
