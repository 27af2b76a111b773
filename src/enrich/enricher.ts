import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { ScanFusionConfig } from "../config.js";
import { logger } from "../logger.js";
import { readJSON } from "../storage/index.js";
import type {
  EnrichedHost,
  EnrichedPort,
  PortRisk,
  ReferenceData,
  RiskLevel,
  RiskWeights,
  UnifiedHost,
  UnifiedPort,
} from "../types.js";

export const DEFAULT_REFERENCE_DIR = fileURLToPath(new URL("../../data", import.meta.url));

export const DEFAULT_WEIGHTS: RiskWeights = {
  port: 3.0,
  cve: 5.0,
  outdated_version: 3.0,
  weak_cipher: 2.5,
};

const LEVEL_MULTIPLIERS: Record<RiskLevel, number> = {
  critical: 1.5,
  high: 1.2,
  medium: 1.0,
  low: 0.7,
};

const MAX_PORT_FINDINGS = 3;

// ── Reference data ──

const RiskLevelSchema = z.enum(["critical", "high", "medium", "low"]);

const RiskPortsSchema = z.object({
  critical: z.array(z.number().int()).optional(),
  high: z.array(z.number().int()).optional(),
  medium: z.array(z.number().int()).optional(),
  low: z.array(z.number().int()).optional(),
});

const VersionRisksSchema = z.record(
  z.record(z.object({ risk: RiskLevelSchema, note: z.string().optional() }))
);

const BusinessPortsSchema = z.record(z.array(z.number().int()));

export const EMPTY_REFERENCE: ReferenceData = { risk_ports: {}, version_risks: {}, business_ports: {} };

async function loadTable<T>(dir: string, file: string, schema: z.ZodType<T>, fallback: T): Promise<T> {
  const filePath = path.join(dir, file);
  try {
    const result = schema.safeParse(await readJSON(filePath, fallback));
    if (result.success) return result.data;
    logger.warn({ file: filePath, issues: result.error.issues }, "invalid reference table, ignoring it");
  } catch (err: unknown) {
    logger.warn({ err, file: filePath }, "could not load reference table, ignoring it");
  }
  return fallback;
}

export async function loadReferenceData(dir: string = DEFAULT_REFERENCE_DIR): Promise<ReferenceData> {
  return {
    risk_ports: await loadTable(dir, "risk_ports.json", RiskPortsSchema, {}),
    version_risks: await loadTable(dir, "version_risks.json", VersionRisksSchema, {}),
    business_ports: await loadTable(dir, "business_ports.json", BusinessPortsSchema, {}),
  };
}

// ── Scoring ──

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function scoreToLevel(score: number): RiskLevel {
  if (score >= 9) return "critical";
  if (score >= 7) return "high";
  if (score >= 4) return "medium";
  return "low";
}

export class Enricher {
  readonly weights: RiskWeights;

  constructor(
    private readonly reference: ReferenceData = EMPTY_REFERENCE,
    config: ScanFusionConfig = {}
  ) {
    this.weights = { ...DEFAULT_WEIGHTS, ...config.risk_weights };
  }

  static async create(config: ScanFusionConfig = {}): Promise<Enricher> {
    const reference = await loadReferenceData(config.reference_dir ?? DEFAULT_REFERENCE_DIR);
    return new Enricher(reference, config);
  }

  enrichHosts(hosts: UnifiedHost[]): EnrichedHost[] {
    return hosts.map((host) => this.enrichHost(host));
  }

  enrichHost(host: UnifiedHost): EnrichedHost {
    const ports: EnrichedPort[] = host.ports.map((port) => ({
      ...port,
      risk: this.portRisk(port, host),
      business_function: this.businessFunction(port.port),
    }));

    let total = ports.reduce((sum, p) => sum + p.risk.score, 0);
    total += host.cves.length * this.weights.cve * 0.5;
    total += host.weak_ciphers.length * this.weights.weak_cipher * 0.3;
    const riskScore = roundScore(total);

    return { ...host, ports, risk_score: riskScore, risk_level: scoreToLevel(riskScore) };
  }

  portRisk(port: UnifiedPort, host: Pick<UnifiedHost, "cves" | "weak_ciphers">): PortRisk {
    let score = 0;
    const findings: string[] = [];

    for (const level of RiskLevelSchema.options) {
      if (this.reference.risk_ports[level]?.includes(port.port)) {
        score += this.weights.port * LEVEL_MULTIPLIERS[level];
        findings.push(`High-risk port: ${port.port}`);
      }
    }

    const service = port.service.toLowerCase();
    const version = port.version.toLowerCase();
    for (const [riskyService, patterns] of Object.entries(this.reference.version_risks)) {
      if (!service.includes(riskyService.toLowerCase())) continue;
      // First matching pattern per service
      for (const [pattern, info] of Object.entries(patterns)) {
        if (version.includes(pattern.replaceAll("*", "").toLowerCase())) {
          score += this.weights.outdated_version * LEVEL_MULTIPLIERS[info.risk];
          findings.push(`Outdated ${port.service}: ${port.version}`);
          break;
        }
      }
    }

    for (const cve of host.cves) {
      if (cve.port === port.port) {
        score += this.weights.cve;
        findings.push(`CVE: ${cve.id}`);
      }
    }

    for (const cipher of host.weak_ciphers) {
      if (cipher.port === port.port) {
        score += this.weights.weak_cipher;
        findings.push(`Weak cipher: ${cipher.cipher}`);
      }
    }

    return {
      level: scoreToLevel(score),
      score: roundScore(score),
      findings: findings.slice(0, MAX_PORT_FINDINGS),
    };
  }

  businessFunction(port: number): string {
    for (const [fn, ports] of Object.entries(this.reference.business_ports)) {
      if (ports.includes(port)) return fn;
    }
    return "other";
  }
}
