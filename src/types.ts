// ── Scan input types ──

export type ScanFormat = "xml" | "gnmap" | "nmap";

export interface ScriptTable {
  [key: string]: string | ScriptTable;
}

export interface ScriptFinding {
  id: string;
  output: string;
  full_output: string;
  tables: ScriptTable[];
}

export interface CveFinding {
  id: string;
  script: string;
  port: number | null;
}

export interface WeakCipherFinding {
  cipher: string;
  script: string;
  port: number | null;
}

export interface PortObservation {
  port: number;
  protocol: string;
  state: string;
  service: string;
  version: string;
  product: string;
  extrainfo: string;
  scripts: ScriptFinding[];
}

export interface InputRecord {
  ip: string;
  hostname: string;
  os: string;
  ports: PortObservation[];
  scripts: ScriptFinding[];
  weak_ciphers: WeakCipherFinding[];
  cves: CveFinding[];
  command: string;
  timestamp?: string;
  source_file: string;
}

export interface ScanParser {
  format: ScanFormat;
  parse(content: string, sourceFile: string): Promise<InputRecord[]>;
}

// ── Fusion output types ──

export interface UnifiedPort {
  port: number;
  protocol: string;
  state: string;
  service: string;
  version: string;
  product: string;
  extrainfo: string;
  scripts: ScriptFinding[];
}

export interface UnifiedHost {
  ip: string;
  hostname: string;
  os: string;
  ports: UnifiedPort[];
  scripts: ScriptFinding[];
  weak_ciphers: WeakCipherFinding[];
  cves: CveFinding[];
  subnet: string;
  commands: string[];
  source_files: string[];
  port_count: number;
  first_seen: string | null;
  last_seen: string | null;
}

export interface FusionSummary {
  files_processed: number;
  unique_ips: number;
  total_ports_seen: number;
  ports_after_fusion: number;
  duplicate_ports_removed: number;
  scripts_merged: number;
}

export interface FusionResult {
  hosts: UnifiedHost[];
  summary: FusionSummary;
}

// ── Enrichment types ──

export const RISK_LEVELS = ["critical", "high", "medium", "low"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface RiskWeights {
  port: number;
  cve: number;
  outdated_version: number;
  weak_cipher: number;
}

export interface PortRisk {
  level: RiskLevel;
  score: number;
  findings: string[];
}

export interface EnrichedPort extends UnifiedPort {
  risk: PortRisk;
  business_function: string;
}

export interface EnrichedHost extends Omit<UnifiedHost, "ports"> {
  ports: EnrichedPort[];
  risk_score: number;
  risk_level: RiskLevel;
}

export interface VersionRisk {
  risk: RiskLevel;
  note?: string;
}

export interface ReferenceData {
  risk_ports: Partial<Record<RiskLevel, number[]>>;
  version_risks: Record<string, Record<string, VersionRisk>>;
  business_ports: Record<string, number[]>;
}

// ── Analysis types ──

export const TABLE_IDS = ["table1", "table2", "table3", "table4"] as const;

export type TableId = (typeof TABLE_IDS)[number];

export interface HostSummaryRow {
  ip: string;
  hostname: string;
  total_ports: number;
  tcp_ports: number;
  udp_ports: number;
  total_services: number;
  os: string;
  risk_level: RiskLevel;
}

export interface HostDetailPort {
  port: number;
  protocol: string;
  service: string;
  version: string;
  risk: RiskLevel;
  script_summary: string[];
  business_function: string;
}

export interface HostDetail {
  ip: string;
  hostname: string;
  os: string;
  risk_level: RiskLevel;
  ports: HostDetailPort[];
  cves: CveFinding[];
  weak_ciphers: WeakCipherFinding[];
}

export interface PortFrequencyRow {
  port: number;
  protocol: string;
  count: number;
  ip_list: string[];
  service: string;
}

export interface ExposedHost {
  ip: string;
  hostname: string;
  os: string;
  service: string;
  version: string;
  business_function: string;
  risk: RiskLevel;
}

export interface ServiceExposure {
  port: number;
  protocol: string;
  host_count: number;
  service: string;
  hosts: ExposedHost[];
}

export interface SubnetSummary {
  subnet: string;
  host_count: number;
  ip_range: string;
}

export interface AnalysisResult {
  table1: HostSummaryRow[];
  table2: HostDetail[];
  table3: PortFrequencyRow[];
  table4: ServiceExposure[];
  sorted_hosts: EnrichedHost[];
  subnets: SubnetSummary[];
}

// ── Report types ──

export interface ReportContext {
  analysis: AnalysisResult;
  summary: FusionSummary;
  commands: string[];
  tables: TableId[];
  generated_at: Date;
}

export interface ReportOptions {
  verbose?: boolean;
}
