import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { logger } from "../logger.js";
import type { ScanFormat } from "../types.js";
import { isErrnoError } from "./engine.js";

export type ScanFileSet = Record<ScanFormat, string[]>;

const SNIFF_LINES = 5;

async function sniffFormat(filePath: string): Promise<ScanFormat | undefined> {
  let head: string;
  try {
    const handle = await fs.open(filePath, "r");
    try {
      const buffer = Buffer.alloc(4096);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      head = buffer.subarray(0, bytesRead).toString("utf-8");
    } finally {
      await handle.close();
    }
  } catch (err: unknown) {
    logger.debug({ err, file: filePath }, "could not read file while detecting format");
    return undefined;
  }

  const text = head.split(/\r?\n/).slice(0, SNIFF_LINES).join("\n");
  if (text.includes("<?xml") && text.includes("nmaprun")) return "xml";
  if (text.includes("Host:") && text.includes("Ports:")) return "gnmap";
  if (text.includes("Nmap scan report for")) return "nmap";
  return undefined;
}

export async function classifyFile(filePath: string): Promise<ScanFormat | undefined> {
  const name = path.basename(filePath).toLowerCase();
  if (name.endsWith(".xml")) return "xml";
  if (name.includes(".gnmap")) return "gnmap";
  if (name.includes(".nmap")) return "nmap";
  return sniffFormat(filePath);
}

async function walk(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Collect the scan files under `inputPath`, grouped by format. A single file is
 * classified on its own; a directory is searched recursively.
 */
export async function findScanFiles(inputPath: string): Promise<ScanFileSet> {
  let stat: Stats;
  try {
    stat = await fs.stat(inputPath);
  } catch (err: unknown) {
    if (isErrnoError(err, "ENOENT")) {
      throw Object.assign(new Error(`Input path not found: ${inputPath}`), { code: "input_not_found" });
    }
    throw err;
  }

  const candidates = stat.isDirectory() ? await walk(inputPath) : [inputPath];
  const found: ScanFileSet = { xml: [], gnmap: [], nmap: [] };

  for (const file of candidates) {
    const format = await classifyFile(file);
    if (format) {
      found[format].push(file);
    } else {
      logger.debug({ file }, "skipping file with unrecognised format");
    }
  }

  for (const list of Object.values(found)) {
    list.sort();
  }
  return found;
}
