import { FusionEngine } from "./fusion/index.js";
import { logger } from "./logger.js";
import { parseFile } from "./parsers/index.js";
import { findScanFiles } from "./storage/index.js";
import type { ScanFileSet } from "./storage/index.js";
import type { FusionResult, ScanFormat } from "./types.js";

export interface ScanFile {
  path: string;
  format: ScanFormat;
}

const FORMAT_ORDER: ScanFormat[] = ["xml", "gnmap", "nmap"];

export function orderScanFiles(found: ScanFileSet): ScanFile[] {
  return FORMAT_ORDER.flatMap((format) => [...found[format]].sort().map((p) => ({ path: p, format })));
}

/** Parse the given files in order into a fresh engine and return the fused hosts. */
export async function fuseFiles(files: ScanFile[]): Promise<FusionResult> {
  const engine = new FusionEngine();

  for (const file of files) {
    const records = await parseFile(file.format, file.path);
    engine.addScan(records, file.path);
  }

  engine.resolveConflicts();
  const summary = engine.getFusionSummary();
  logger.info(
    {
      files: summary.files_processed,
      hosts: summary.unique_ips,
      ports: summary.ports_after_fusion,
      duplicates: summary.duplicate_ports_removed,
    },
    "fusion complete"
  );

  return { hosts: engine.getUnifiedHosts(), summary };
}

export async function fuseInput(inputPath: string): Promise<FusionResult> {
  const found = await findScanFiles(inputPath);
  logger.info(
    { input: inputPath, xml: found.xml.length, gnmap: found.gnmap.length, nmap: found.nmap.length },
    "discovered scan files"
  );
  return fuseFiles(orderScanFiles(found));
}
