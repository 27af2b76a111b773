import type { PortObservation, ScriptFinding, UnifiedPort } from "../types.js";
import { FusionStateError } from "./errors.js";

export function portKey(port: number, protocol: string): string {
  return `${port}/${protocol}`;
}

export function comparePorts(a: { port: number; protocol: string }, b: { port: number; protocol: string }): number {
  if (a.port !== b.port) return a.port - b.port;
  if (a.protocol === b.protocol) return 0;
  return a.protocol < b.protocol ? -1 : 1;
}

const UNKNOWN = "unknown";

// The placeholder carries no detail, so any real value outranks it
function detailLength(value: string): number {
  return value === UNKNOWN ? 0 : value.length;
}

// Accumulates every observation of one (port, protocol) on one host.
export class PortMergeUnit {
  readonly port: number;
  readonly protocol: string;
  readonly state: string;
  readonly extrainfo: string;
  private service: string;
  private version: string;
  private product: string;
  private readonly scripts: ScriptFinding[];
  private versionSeen: boolean;
  private snapshot: UnifiedPort | null = null;

  constructor(observation: PortObservation) {
    this.port = observation.port;
    this.protocol = observation.protocol;
    this.state = observation.state;
    this.service = observation.service;
    this.version = observation.version;
    this.product = observation.product;
    this.extrainfo = observation.extrainfo;
    this.scripts = [...observation.scripts];
    this.versionSeen = observation.version !== UNKNOWN && observation.version !== "";
  }

  get key(): string {
    return portKey(this.port, this.protocol);
  }

  get hasVersion(): boolean {
    return this.versionSeen;
  }

  merge(observation: PortObservation): void {
    // Longest string wins; ties keep what we already have
    if (observation.service !== UNKNOWN && observation.service.length > detailLength(this.service)) {
      this.service = observation.service;
    }

    if (observation.version !== UNKNOWN && observation.version.length > detailLength(this.version)) {
      this.version = observation.version;
      this.versionSeen = true;
    }

    if (observation.product && !this.product) {
      this.product = observation.product;
    }

    for (const script of observation.scripts) {
      if (!this.scripts.some((s) => s.id === script.id)) {
        this.scripts.push(script);
      }
    }
  }

  finalize(): UnifiedPort {
    let version = this.version;
    if (this.product && version === UNKNOWN) {
      version = this.product;
    } else if (this.product) {
      version = `${this.product} ${version}`;
    }

    this.snapshot = Object.freeze({
      port: this.port,
      protocol: this.protocol,
      state: this.state,
      service: this.service,
      version,
      product: this.product,
      extrainfo: this.extrainfo,
      scripts: [...this.scripts],
    });
    return this.snapshot;
  }

  toDict(): UnifiedPort {
    if (!this.snapshot) {
      throw new FusionStateError("not_finalized", `Port ${this.key} has not been finalized`);
    }
    return this.snapshot;
  }
}
