import type { FusionSummary, InputRecord, UnifiedHost } from "../types.js";
import { FusionStateError } from "./errors.js";
import { HostFusionRecord } from "./host.js";

interface FusionCounters {
  files_processed: number;
  unique_ips: number;
  total_ports_seen: number;
  ports_after_fusion: number;
  scripts_merged: number;
}

/**
 * Per-run fusion state: one HostFusionRecord per IP.
 *
 * Feed every parsed file through addScan() in a stable order, seal the run
 * with resolveConflicts(), then read hosts and statistics. Hostname and
 * product are first-wins, so the order of addScan() calls is part of the
 * input.
 */
export class FusionEngine {
  private readonly hosts = new Map<string, HostFusionRecord>();
  private readonly counters: FusionCounters = {
    files_processed: 0,
    unique_ips: 0,
    total_ports_seen: 0,
    ports_after_fusion: 0,
    scripts_merged: 0,
  };
  private finalized = false;

  get isFinalized(): boolean {
    return this.finalized;
  }

  get hostCount(): number {
    return this.hosts.size;
  }

  getHost(ip: string): HostFusionRecord | undefined {
    return this.hosts.get(ip);
  }

  addScan(records: InputRecord | InputRecord[], sourceLabel?: string): void {
    if (this.finalized) {
      throw new FusionStateError("already_finalized", "Fusion already resolved; start a new engine for another run");
    }

    this.counters.files_processed++;

    const batch = Array.isArray(records) ? records : [records];
    for (const record of batch) {
      if (!record.ip) continue;

      let host = this.hosts.get(record.ip);
      if (!host) {
        host = new HostFusionRecord(record.ip);
        this.hosts.set(record.ip, host);
        this.counters.unique_ips++;
      }

      host.merge(record.source_file || !sourceLabel ? record : { ...record, source_file: sourceLabel });
      this.counters.total_ports_seen += record.ports.length;
    }
  }

  resolveConflicts(): void {
    let portsAfterFusion = 0;
    let scriptsMerged = 0;
    for (const host of this.hosts.values()) {
      host.finalize();
      portsAfterFusion += host.portCount;
      scriptsMerged += host.scriptCount;
    }
    // Recomputed rather than accumulated so a second call cannot double count
    this.counters.ports_after_fusion = portsAfterFusion;
    this.counters.scripts_merged = scriptsMerged;
    this.finalized = true;
  }

  getUnifiedHosts(): UnifiedHost[] {
    this.requireFinalized();
    return [...this.hosts.values()].map((host) => host.toDict());
  }

  getFusionSummary(): FusionSummary {
    this.requireFinalized();
    return {
      files_processed: this.counters.files_processed,
      unique_ips: this.counters.unique_ips,
      total_ports_seen: this.counters.total_ports_seen,
      ports_after_fusion: this.counters.ports_after_fusion,
      duplicate_ports_removed: this.counters.total_ports_seen - this.counters.ports_after_fusion,
      scripts_merged: this.counters.scripts_merged,
    };
  }

  private requireFinalized(): void {
    if (!this.finalized) {
      throw new FusionStateError("not_finalized", "Call resolveConflicts() before reading fusion results");
    }
  }
}
